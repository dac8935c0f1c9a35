/**
 * Partial aggregates exchanged between the map and reduce stages, and the
 * structured tags used to group them.
 */
import { ColumnFamily } from "./ColumnType";
import { DivKey } from "./defs";
import { ShapeAttrName, SummaryEntry } from "./attrs";
import { MomentAccum } from "./accum/moments";
import { RangeAccum } from "./accum/range";
import { FreqAccum } from "./accum/freqTable";
import { PercentileTable, ValuePool } from "./accum/valuePool";

export type SummaryFamily = Exclude<ColumnFamily, "unsupported">;

export interface AttrTag {
  tagType: "attr";
  attr: ShapeAttrName;
}

export interface SummaryTag {
  tagType: "summary";
  family: SummaryFamily;
  column: string;
}

export type ContribTag = AttrTag | SummaryTag;

export const attrTag = (attr: ShapeAttrName): AttrTag => ({
  tagType: "attr",
  attr,
});

export const summaryTag = (family: SummaryFamily, column: string): SummaryTag => ({
  tagType: "summary",
  family,
  column,
});

/**
 * A string identifying a tag, for executors that group by string keys.
 * Distinct tags always have distinct ids.
 */
export const tagId = (tag: ContribTag): string => {
  switch (tag.tagType) {
    case "attr":
      return JSON.stringify([tag.tagType, tag.attr]);
    case "summary":
      return JSON.stringify([tag.tagType, tag.family, tag.column]);
    default:
      const invalid: never = tag;
      throw new Error("tagId: unknown tag type: " + JSON.stringify(invalid));
  }
};

export interface SumAccum {
  accType: "sum";
  total: number;
}

export interface KeysAccum {
  accType: "keys";
  keys: ReadonlyArray<DivKey>;
}

export interface PoolAccum {
  accType: "pool";
  values: ValuePool;
}

export interface QuantAccum {
  accType: "quant";
  naCount: number;
  moments: MomentAccum;
  range: RangeAccum<number>;
}

export interface CategAccum {
  accType: "categ";
  naCount: number;
  totalRows: number;
  freq: FreqAccum;
}

export interface DatetimeAccum {
  accType: "datetime";
  naCount: number;
  range: RangeAccum<Date>;
}

export type Accum =
  | SumAccum
  | KeysAccum
  | PoolAccum
  | QuantAccum
  | CategAccum
  | DatetimeAccum;

export interface Contribution {
  tag: ContribTag;
  value: Accum;
}

// Reportable form of a fully combined accumulator:
export type FinalValue =
  | { valType: "number"; value: number }
  | { valType: "keys"; keys: DivKey[] }
  | { valType: "percentiles"; table: PercentileTable }
  | { valType: "summary"; entry: SummaryEntry };

export type TaggedResult = [ContribTag, FinalValue];
