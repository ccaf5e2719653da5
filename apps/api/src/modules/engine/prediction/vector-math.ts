/** Ten entries, one per digit. Signal outputs sum to 1. */
export type ScoreVector = number[];

export function uniformVector(): ScoreVector {
  return new Array<number>(10).fill(0.1);
}

/** Scales to sum 1; an all-zero (or invalid) vector becomes uniform. */
export function normalize(raw: readonly number[]): ScoreVector {
  const clean = raw.map((v) => (Number.isFinite(v) && v > 0 ? v : 0));
  const sum = clean.reduce((acc, v) => acc + v, 0);
  if (sum <= 0) return uniformVector();
  return clean.map((v) => v / sum);
}

/** Index of the largest entry; the lowest index wins ties. */
export function argMax(values: readonly number[]): number {
  let best = 0;
  for (let i = 1; i < values.length; i += 1) {
    if (values[i] > values[best]) best = i;
  }
  return best;
}

export function mean(values: readonly number[]): number {
  if (values.length === 0) return 0;
  return values.reduce((acc, v) => acc + v, 0) / values.length;
}

/** Population variance. */
export function variance(values: readonly number[]): number {
  if (values.length === 0) return 0;
  const m = mean(values);
  return values.reduce((acc, v) => acc + (v - m) ** 2, 0) / values.length;
}

export function stdDev(values: readonly number[]): number {
  return Math.sqrt(variance(values));
}

export function round(value: number, decimals: number): number {
  const pow = 10 ** decimals;
  return Math.round(value * pow) / pow;
}
