import { InsufficientDataError } from "../../core/src/errors.js";

export type Quartiles = {
  q1: number;
  median: number;
  q3: number;
};

export type IqrBounds = {
  q1: number;
  q3: number;
  iqr: number;
  lower: number;
  upper: number;
};

export type SeriesStats = {
  count: number;
  mean: number;
  stddev: number; // sample
  min: number;
  max: number;
  q1: number;
  median: number;
  q3: number;
  iqr: number;
};

function requireValues(values: readonly number[], what: string): void {
  if (values.length === 0) throw new InsufficientDataError(1, 0, what);
}

export function mean(values: readonly number[]): number {
  requireValues(values, "mean");
  let s = 0;
  let min = values[0];
  let max = values[0];
  for (const v of values) {
    s += v;
    if (v < min) min = v;
    if (v > max) max = v;
  }
  // exact for constant input; summation would drift by an ulp
  if (min === max) return min;
  return s / values.length;
}

function sumSquaredDeviations(values: readonly number[]): number {
  const m = mean(values);
  let ss = 0;
  for (const v of values) ss += (v - m) ** 2;
  return ss;
}

/** Denominator n−1; a single value has stddev 0. */
export function sampleStdDev(values: readonly number[]): number {
  requireValues(values, "sampleStdDev");
  if (values.length < 2) return 0;
  return Math.sqrt(sumSquaredDeviations(values) / (values.length - 1));
}

export function populationStdDev(values: readonly number[]): number {
  requireValues(values, "populationStdDev");
  return Math.sqrt(sumSquaredDeviations(values) / values.length);
}

/**
 * Linear interpolation between closest ranks at position (n−1)·p
 * of the sorted copy.
 */
export function quantile(values: readonly number[], p: number): number {
  requireValues(values, "quantile");
  if (!(p >= 0 && p <= 1)) throw new RangeError(`quantile p must be within [0, 1], got ${p}`);

  const sorted = [...values].sort((a, b) => a - b);
  const k = (sorted.length - 1) * p;
  const f = Math.floor(k);
  const c = Math.min(f + 1, sorted.length - 1);
  return sorted[f] + (sorted[c] - sorted[f]) * (k - f);
}

export function quartiles(values: readonly number[]): Quartiles {
  return {
    q1: quantile(values, 0.25),
    median: quantile(values, 0.5),
    q3: quantile(values, 0.75),
  };
}

export function iqrBounds(values: readonly number[], multiplier = 1.5): IqrBounds {
  const { q1, q3 } = quartiles(values);
  const iqr = q3 - q1;
  return {
    q1,
    q3,
    iqr,
    lower: q1 - multiplier * iqr,
    upper: q3 + multiplier * iqr,
  };
}

export function describe(values: readonly number[]): SeriesStats {
  requireValues(values, "describe");
  const q = quartiles(values);

  return {
    count: values.length,
    mean: mean(values),
    stddev: sampleStdDev(values),
    min: Math.min(...values),
    max: Math.max(...values),
    q1: q.q1,
    median: q.median,
    q3: q.q3,
    iqr: q.q3 - q.q1,
  };
}
