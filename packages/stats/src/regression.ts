import { InsufficientDataError } from "../../core/src/errors.js";

export type RegressionPoint = { x: number; y: number };

export type RegressionModel = {
  slope: number;
  intercept: number;
  r_squared: number;
  n: number;
};

/**
 * Ordinary least squares fit of y = slope * x + intercept.
 * Uses centered sums so a constant series yields a slope of exactly 0.
 */
export function fitLinearRegression(points: readonly RegressionPoint[]): RegressionModel {
  const n = points.length;
  if (n < 2) throw new InsufficientDataError(2, n, "linear regression");

  let sumX = 0;
  let sumY = 0;
  for (const p of points) {
    sumX += p.x;
    sumY += p.y;
  }
  const meanX = sumX / n;
  const meanY = sumY / n;

  let sxx = 0;
  let sxy = 0;
  let syy = 0;
  for (const p of points) {
    const dx = p.x - meanX;
    const dy = p.y - meanY;
    sxx += dx * dx;
    sxy += dx * dy;
    syy += dy * dy;
  }

  // every x identical: no direction to fit
  if (sxx === 0) return { slope: 0, intercept: meanY, r_squared: 0, n };

  const slope = sxy / sxx;
  const intercept = meanY - slope * meanX;

  const ssRes = points.reduce((s, p) => s + (p.y - (slope * p.x + intercept)) ** 2, 0);
  const r_squared = syy > 0 ? Math.max(0, 1 - ssRes / syy) : 1;

  return { slope, intercept, r_squared, n };
}

export function predict(model: Pick<RegressionModel, "slope" | "intercept">, x: number): number {
  return model.slope * x + model.intercept;
}

/** (index, value) pairs for a plain ordered sequence. */
export function indexedPoints(values: readonly number[]): RegressionPoint[] {
  return values.map((y, x) => ({ x, y }));
}
