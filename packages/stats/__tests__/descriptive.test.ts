import { describe as group, expect, it } from "vitest";

import { InsufficientDataError } from "../../core/src/errors.js";
import {
  describe,
  iqrBounds,
  mean,
  populationStdDev,
  quantile,
  quartiles,
  sampleStdDev,
} from "../src/descriptive.js";

group("descriptive statistics", () => {
  it("computes mean and both standard deviations", () => {
    const v = [2, 4, 4, 4, 5, 5, 7, 9];
    expect(mean(v)).toBe(5);
    expect(populationStdDev(v)).toBe(2);
    expect(sampleStdDev(v)).toBeCloseTo(Math.sqrt(32 / 7), 12);
  });

  it("is exact on constant input", () => {
    const v = Array.from({ length: 10 }, () => 0.1);
    expect(mean(v)).toBe(0.1);
    expect(sampleStdDev(v)).toBe(0);
    expect(iqrBounds(v)).toEqual({ q1: 0.1, q3: 0.1, iqr: 0, lower: 0.1, upper: 0.1 });
  });

  it("has stddev 0 for a single value", () => {
    expect(sampleStdDev([42])).toBe(0);
  });

  it("interpolates quantiles between closest ranks", () => {
    expect(quantile([1, 2, 3, 4], 0.25)).toBe(1.75);
    expect(quantile([4, 1, 3, 2], 0.5)).toBe(2.5);
    expect(quartiles([1, 2, 3, 4, 5])).toEqual({ q1: 2, median: 3, q3: 4 });
  });

  it("widens IQR bounds by the multiplier", () => {
    expect(iqrBounds([1, 2, 3, 4, 5], 1.5)).toEqual({ q1: 2, q3: 4, iqr: 2, lower: -1, upper: 7 });
    expect(iqrBounds([1, 2, 3, 4, 5], 3)).toMatchObject({ lower: -4, upper: 10 });
  });

  it("rejects out-of-range quantiles", () => {
    expect(() => quantile([1, 2], 1.5)).toThrow(RangeError);
  });

  it("throws InsufficientDataError on empty input", () => {
    expect(() => mean([])).toThrow(InsufficientDataError);
    expect(() => quantile([], 0.5)).toThrow(InsufficientDataError);
    expect(() => describe([])).toThrow(/INSUFFICIENT_DATA/);
  });

  it("summarizes a sample", () => {
    expect(describe([3, 1, 2])).toEqual({
      count: 3,
      mean: 2,
      stddev: 1,
      min: 1,
      max: 3,
      q1: 1.5,
      median: 2,
      q3: 2.5,
      iqr: 1,
    });
  });
});
