/**
 * Central moment sums for one numeric column, up to the fourth order.
 *
 * Local moments are computed in a single pass with the update of
 * Terriberry (an extension of Welford's algorithm); partial results
 * are merged with the pairwise formulas of Bennett et al.,
 * "Numerically stable, single-pass, parallel statistics algorithms" (2009).
 */

export interface MomentAccum {
  n: number;
  mean: number;
  m2: number;
  m3: number;
  m4: number;
}

export interface MomentStats {
  mean: number | null;
  variance: number | null;
  skewness: number | null;
  kurtosis: number | null;
}

export const emptyMoments = (): MomentAccum => ({
  n: 0,
  mean: 0,
  m2: 0,
  m3: 0,
  m4: 0,
});

export function calculateMoments(values: Iterable<number>): MomentAccum {
  let n = 0;
  let mean = 0;
  let m2 = 0;
  let m3 = 0;
  let m4 = 0;

  for (const x of values) {
    const n1 = n;
    n++;
    const delta = x - mean;
    const deltaN = delta / n;
    const deltaN2 = deltaN * deltaN;
    const term1 = delta * deltaN * n1;
    mean += deltaN;
    // m4 and m3 are updated from the previous m2 / m3, so order matters
    m4 += term1 * deltaN2 * (n * n - 3 * n + 3) + 6 * deltaN2 * m2 - 4 * deltaN * m3;
    m3 += term1 * deltaN * (n - 2) - 3 * deltaN * m2;
    m2 += term1;
  }

  return { n, mean, m2, m3, m4 };
}

export function combineMoments(a: MomentAccum, b: MomentAccum): MomentAccum {
  if (b.n === 0) {
    return { ...a };
  }
  if (a.n === 0) {
    return { ...b };
  }

  const nA = a.n;
  const nB = b.n;
  const n = nA + nB;
  const delta = b.mean - a.mean;
  const delta2 = delta * delta;
  const delta3 = delta2 * delta;
  const delta4 = delta2 * delta2;

  const mean = a.mean + (delta * nB) / n;
  const m2 = a.m2 + b.m2 + (delta2 * nA * nB) / n;
  const m3 =
    a.m3 +
    b.m3 +
    (delta3 * nA * nB * (nA - nB)) / (n * n) +
    (3 * delta * (nA * b.m2 - nB * a.m2)) / n;
  const m4 =
    a.m4 +
    b.m4 +
    (delta4 * nA * nB * (nA * nA - nA * nB + nB * nB)) / (n * n * n) +
    (6 * delta2 * (nA * nA * b.m2 + nB * nB * a.m2)) / (n * n) +
    (4 * delta * (nA * b.m3 - nB * a.m3)) / n;

  return { n, mean, m2, m3, m4 };
}

export const combineMultipleMoments = (
  moments: ReadonlyArray<MomentAccum>
): MomentAccum => moments.reduce(combineMoments, emptyMoments());

export function momentsToStatistics(acc: MomentAccum): MomentStats {
  const { n, mean, m2, m3, m4 } = acc;
  if (n === 0) {
    return { mean: null, variance: null, skewness: null, kurtosis: null };
  }
  const variance = n < 2 ? null : m2 / (n - 1);
  const skewness = m2 === 0 ? null : (Math.sqrt(n) * m3) / Math.pow(m2, 1.5);
  const kurtosis = m2 === 0 ? null : (n * m4) / (m2 * m2) - 3;
  return { mean, variance, skewness, kurtosis };
}
