/**
 * Dataset-level attributes computed by updateAttributes.
 */
import { DivKey } from "./defs";
import { MomentStats } from "./accum/moments";
import { FreqTableEntry } from "./accum/freqTable";
import { PercentileTable } from "./accum/valuePool";

export type DivKind = "collection" | "frame";

// attributes of every divided dataset:
export type CollectionAttrName =
  | "totObjectSize"
  | "nDiv"
  | "keys"
  | "splitSizeDistn";

// attributes only a divided frame has:
export type FrameAttrName = "nRow" | "splitRowDistn" | "summary";

export type AttrName = CollectionAttrName | FrameAttrName;

// attributes accumulated by a single tag (everything but the per-column summary)
export type ShapeAttrName = Exclude<AttrName, "summary">;

export const collectionAttrNames: CollectionAttrName[] = [
  "totObjectSize",
  "nDiv",
  "keys",
  "splitSizeDistn",
];

export const frameAttrNames: FrameAttrName[] = [
  "nRow",
  "splitRowDistn",
  "summary",
];

export const allAttrNames: AttrName[] = [
  ...collectionAttrNames,
  ...frameAttrNames,
];

export const isAttrName = (name: string): name is AttrName =>
  allAttrNames.some((attr) => attr === name);

export interface NumericSummary {
  summaryType: "numeric";
  naCount: number;
  stats: MomentStats;
  range: [number | null, number | null];
}

export interface CategoricalSummary {
  summaryType: "categorical";
  naCount: number;
  freqTable: FreqTableEntry[];
  // false when more distinct values were seen than could be tracked
  complete: boolean;
}

export interface DatetimeSummary {
  summaryType: "datetime";
  naCount: number;
  range: [Date | null, Date | null];
}

export type SummaryEntry = NumericSummary | CategoricalSummary | DatetimeSummary;

export type DivSummary = { [columnName: string]: SummaryEntry };

export interface GlobalAttributes {
  totObjectSize: number;
  nDiv: number;
  nRow: number;
  keys: DivKey[];
  keyHashes: string[];
  splitSizeDistn: PercentileTable;
  splitRowDistn: PercentileTable;
  summary: DivSummary;
}
