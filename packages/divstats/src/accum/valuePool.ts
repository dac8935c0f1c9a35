import * as _ from "lodash";

// One value per partition, so a pool is always small enough to keep whole.
export type ValuePool = ReadonlyArray<number>;

export interface PercentilePoint {
  prob: number;
  value: number | null;
}

export type PercentileTable = PercentilePoint[];

export const percentileSteps = 100;

export const combinePools = (a: ValuePool, b: ValuePool): ValuePool =>
  a.concat(b);

/**
 * Sample quantile by linear interpolation between order statistics:
 * for sorted values x[0..n-1], the p-quantile is taken at position
 * h = (n - 1) * p.
 */
export function quantileSorted(sorted: ValuePool, p: number): number | null {
  const n = sorted.length;
  if (n === 0) {
    return null;
  }
  const h = (n - 1) * p;
  const lo = Math.floor(h);
  const hi = Math.min(lo + 1, n - 1);
  const frac = h - lo;
  if (frac === 0) {
    return sorted[lo];
  }
  return sorted[lo] + frac * (sorted[hi] - sorted[lo]);
}

// 101 points: the 0th through 100th percentile of the pool
export function percentileTable(pool: ValuePool): PercentileTable {
  const sorted = _.sortBy(pool.filter((v) => Number.isFinite(v)));
  return _.range(0, percentileSteps + 1).map((i) => {
    const prob = i / percentileSteps;
    return { prob, value: quantileSorted(sorted, prob) };
  });
}
