import * as _ from "lodash";

/**
 * Bounded frequency tables for categorical columns.
 *
 * At most `cap` distinct categories are tracked. Once a table is full,
 * categories not already present are dropped, so the counts of a full
 * table may depend on the order in which partitions were combined.
 */

export const defaultMaxCategories = 10000;

export interface FreqAccum {
  counts: ReadonlyMap<string, number>;
  cap: number;
}

export interface FreqTableEntry {
  value: string;
  freq: number;
}

export const emptyFreq = (cap: number = defaultMaxCategories): FreqAccum => ({
  counts: new Map(),
  cap,
});

const addCount = (
  counts: Map<string, number>,
  cap: number,
  value: string,
  n: number
): void => {
  const prev = counts.get(value);
  if (prev !== undefined) {
    counts.set(value, prev + n);
  } else if (counts.size < cap) {
    counts.set(value, n);
  }
};

export function tabulate(
  values: Iterable<string>,
  cap: number = defaultMaxCategories
): FreqAccum {
  const counts = new Map<string, number>();
  for (const v of values) {
    addCount(counts, cap, v, 1);
  }
  return { counts, cap };
}

export function combineFreqs(a: FreqAccum, b: FreqAccum): FreqAccum {
  const cap = Math.min(a.cap, b.cap);
  const counts = new Map<string, number>();
  for (const [value, n] of a.counts) {
    addCount(counts, cap, value, n);
  }
  for (const [value, n] of b.counts) {
    addCount(counts, cap, value, n);
  }
  return { counts, cap };
}

export const freqTotal = (acc: FreqAccum): number =>
  _.sum(Array.from(acc.counts.values()));

// most frequent first, ties broken by value
export function freqTable(acc: FreqAccum): FreqTableEntry[] {
  const entries: FreqTableEntry[] = Array.from(acc.counts, ([value, freq]) => ({
    value,
    freq,
  }));
  return _.orderBy(entries, ["freq", "value"], ["desc", "asc"]);
}
