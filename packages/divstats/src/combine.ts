/**
 * Reduce side: folding local contributions into global accumulators,
 * and finalizing accumulators into reportable values.
 *
 * Every combine returns a fresh accumulator and leaves its inputs alone,
 * so contributions may be merged pairwise, in a tree or as a stream, in
 * any order.
 */
import * as log from "loglevel";
import {
  Accum,
  CategAccum,
  ContribTag,
  DatetimeAccum,
  FinalValue,
  QuantAccum,
  tagId,
} from "./Accum";
import { combineMoments, momentsToStatistics } from "./accum/moments";
import { combineRanges, compareDates, compareNumbers } from "./accum/range";
import { combineFreqs, freqTable, freqTotal } from "./accum/freqTable";
import { combinePools, percentileTable } from "./accum/valuePool";
import { SummaryEntry } from "./attrs";

const mismatch = (a: Accum, b: Accum): Error =>
  new Error(
    `combineAccums: cannot combine '${a.accType}' with '${b.accType}'`
  );

export function combineAccums(a: Accum, b: Accum): Accum {
  switch (a.accType) {
    case "sum":
      if (b.accType !== "sum") throw mismatch(a, b);
      return { accType: "sum", total: a.total + b.total };
    case "keys":
      if (b.accType !== "keys") throw mismatch(a, b);
      return { accType: "keys", keys: a.keys.concat(b.keys) };
    case "pool":
      if (b.accType !== "pool") throw mismatch(a, b);
      return { accType: "pool", values: combinePools(a.values, b.values) };
    case "quant":
      if (b.accType !== "quant") throw mismatch(a, b);
      return {
        accType: "quant",
        naCount: a.naCount + b.naCount,
        moments: combineMoments(a.moments, b.moments),
        range: combineRanges(a.range, b.range, compareNumbers),
      };
    case "categ":
      if (b.accType !== "categ") throw mismatch(a, b);
      return {
        accType: "categ",
        naCount: a.naCount + b.naCount,
        totalRows: a.totalRows + b.totalRows,
        freq: combineFreqs(a.freq, b.freq),
      };
    case "datetime":
      if (b.accType !== "datetime") throw mismatch(a, b);
      return {
        accType: "datetime",
        naCount: a.naCount + b.naCount,
        range: combineRanges(a.range, b.range, compareDates),
      };
    default:
      const invalid: never = a;
      throw new Error("combineAccums: unknown accumulator: " + invalid);
  }
}

/**
 * Fold one batch of contributions for a single tag into the accumulator
 * built from earlier batches (if any).
 */
export function reduceContributions(
  values: ReadonlyArray<Accum>,
  prior?: Accum
): Accum {
  const init = prior ?? values[0];
  if (init === undefined) {
    throw new Error("reduceContributions: no contributions to reduce");
  }
  const rest = prior === undefined ? values.slice(1) : values;
  return rest.reduce(combineAccums, init);
}

const finalizeQuant = (acc: QuantAccum): SummaryEntry => ({
  summaryType: "numeric",
  naCount: acc.naCount,
  stats: momentsToStatistics(acc.moments),
  range: [acc.range.min, acc.range.max],
});

const finalizeCateg = (acc: CategAccum): SummaryEntry => ({
  summaryType: "categorical",
  naCount: acc.naCount,
  freqTable: freqTable(acc.freq),
  complete: acc.totalRows === freqTotal(acc.freq) + acc.naCount,
});

const finalizeDatetime = (acc: DatetimeAccum): SummaryEntry => ({
  summaryType: "datetime",
  naCount: acc.naCount,
  range: [acc.range.min, acc.range.max],
});

export function finalizeAccum(acc: Accum): FinalValue {
  switch (acc.accType) {
    case "sum":
      return { valType: "number", value: acc.total };
    case "keys":
      return { valType: "keys", keys: acc.keys.slice() };
    case "pool":
      return { valType: "percentiles", table: percentileTable(acc.values) };
    case "quant":
      return { valType: "summary", entry: finalizeQuant(acc) };
    case "categ":
      return { valType: "summary", entry: finalizeCateg(acc) };
    case "datetime":
      return { valType: "summary", entry: finalizeDatetime(acc) };
    default:
      const invalid: never = acc;
      throw new Error("finalizeAccum: unknown accumulator: " + invalid);
  }
}

/**
 * The reduce side of an attribute job, as handed to an executor.
 */
export interface Reducer {
  combine(tag: ContribTag, values: ReadonlyArray<Accum>, prior?: Accum): Accum;
  finalize(tag: ContribTag, acc: Accum): FinalValue;
}

export const attrReducer: Reducer = {
  combine(tag, values, prior) {
    return reduceContributions(values, prior);
  },
  finalize(tag, acc) {
    if (
      (acc.accType === "quant" || acc.accType === "datetime") &&
      acc.range.min === null
    ) {
      log.debug(`finalize: no non-missing values for ${tagId(tag)}`);
    }
    return finalizeAccum(acc);
  },
};
