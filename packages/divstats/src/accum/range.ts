// min / max of the non-missing values seen so far; null when none were seen.
export interface RangeAccum<T> {
  min: T | null;
  max: T | null;
}

export type Comparator<T> = (a: T, b: T) => number;

export const compareNumbers: Comparator<number> = (a, b) => a - b;
export const compareDates: Comparator<Date> = (a, b) =>
  a.getTime() - b.getTime();

export const emptyRange = <T>(): RangeAccum<T> => ({ min: null, max: null });

export function rangeOf<T>(
  values: Iterable<T>,
  compare: Comparator<T>
): RangeAccum<T> {
  let min: T | null = null;
  let max: T | null = null;
  for (const v of values) {
    if (min === null || compare(v, min) < 0) {
      min = v;
    }
    if (max === null || compare(v, max) > 0) {
      max = v;
    }
  }
  return { min, max };
}

const pickMin = <T>(a: T | null, b: T | null, compare: Comparator<T>) => {
  if (a === null) return b;
  if (b === null) return a;
  return compare(b, a) < 0 ? b : a;
};

const pickMax = <T>(a: T | null, b: T | null, compare: Comparator<T>) => {
  if (a === null) return b;
  if (b === null) return a;
  return compare(b, a) > 0 ? b : a;
};

export function combineRanges<T>(
  a: RangeAccum<T>,
  b: RangeAccum<T>,
  compare: Comparator<T>
): RangeAccum<T> {
  return {
    min: pickMin(a.min, b.min, compare),
    max: pickMax(a.max, b.max, compare),
  };
}
