/**
 * Spend anomaly detection.
 *
 * Each day is compared with a look-back baseline: the points dated within the
 * previous `lookback_days` calendar days, never the day itself or anything
 * after it. Two independent rules run over that window:
 *
 *   - z rule:   |z| >= z_threshold against the window mean/stddev
 *   - IQR rule: amount outside [Q1 − k·IQR, Q3 + k·IQR] of the window
 *
 * A day firing either rule is reported once, with every rule that fired.
 */

import type { AnomalyConfig, AnomalyConfigInput } from "../../core/src/config.js";
import { parseAnomalyConfig } from "../../core/src/config.js";
import { toEpochDay } from "../../core/src/dates.js";
import { assertSeries } from "../../core/src/invariants.js";
import { round2 } from "../../core/src/money.js";
import type {
  Anomaly,
  AnomalyRule,
  AnomalySeverity,
  DailyCostPoint,
} from "../../core/src/schema.js";
import { iqrBounds, mean, sampleStdDev } from "../../stats/src/descriptive.js";

// absolute stddev floor (one cent) for flat windows whose mean is ~0
const ABSOLUTE_STDDEV_FLOOR = 0.01;

export type BaselineWindow = {
  values: number[];
  mean: number;
  stddev: number;
  iqr_lower: number;
  iqr_upper: number;
};

/**
 * Smallest window that yields a usable baseline. Tied to `min_days` so that
 * the first evaluable day is the one at which the series becomes long enough.
 * A one-point window is flat and goes through the stddev floor.
 */
export function minBaselinePoints(cfg: Pick<AnomalyConfig, "lookback_days" | "min_days">): number {
  return Math.max(1, Math.min(cfg.lookback_days, cfg.min_days - 1));
}

export function baselineWindow(values: number[], iqr_multiplier: number): BaselineWindow {
  const b = iqrBounds(values, iqr_multiplier);
  return {
    values,
    mean: mean(values),
    stddev: sampleStdDev(values),
    iqr_lower: b.lower,
    iqr_upper: b.upper,
  };
}

/**
 * z-score against the window. A flat window (stddev 0) is never divided by:
 * a matching amount scores 0, a departing one is measured against a floor.
 */
export function windowZScore(amount: number, w: BaselineWindow, min_stddev_ratio: number): number {
  if (w.stddev > 0) return (amount - w.mean) / w.stddev;
  if (amount === w.mean) return 0;
  const floor = Math.max(min_stddev_ratio * Math.abs(w.mean), ABSOLUTE_STDDEV_FLOOR);
  return (amount - w.mean) / floor;
}

function zSeverity(absZ: number, cfg: AnomalyConfig): AnomalySeverity | null {
  if (absZ >= cfg.high_z_threshold) return "high";
  if (absZ >= cfg.z_threshold) return "medium";
  return null;
}

function reasonText(
  rules: AnomalyRule[],
  amount: number,
  z: number,
  w: BaselineWindow,
  lookback_days: number
): string {
  const direction = amount >= w.mean ? "spike" : "drop";
  const parts: string[] = [];

  if (rules.includes("z_score")) {
    const base =
      w.stddev > 0
        ? `${lookback_days}-day baseline ${w.mean.toFixed(2)} ± ${w.stddev.toFixed(2)}`
        : `flat ${lookback_days}-day baseline ${w.mean.toFixed(2)}`;
    parts.push(`z-score ${z.toFixed(2)} vs ${base}`);
  }
  if (rules.includes("iqr")) {
    parts.push(`outside IQR bounds [${w.iqr_lower.toFixed(2)}, ${w.iqr_upper.toFixed(2)}]`);
  }

  return `${direction}: ${parts.join("; ")}`;
}

/**
 * Flag anomalous days in an ascending daily series.
 * Fewer than `min_days` points is not an error: the result is simply empty.
 */
export function detectAnomalies(
  series: readonly DailyCostPoint[],
  config: AnomalyConfigInput = {}
): Anomaly[] {
  const cfg = parseAnomalyConfig(config);
  if (series.length < cfg.min_days) return [];
  assertSeries(series);

  const days = series.map((p) => toEpochDay(p.date));
  const amounts = series.map((p) => p.amount);
  const needed = minBaselinePoints(cfg);

  const out: Anomaly[] = [];
  let start = 0;

  for (let i = 0; i < series.length; i++) {
    const from = days[i] - cfg.lookback_days;
    while (start < i && days[start] < from) start++;

    const values = amounts.slice(start, i);
    if (values.length < needed) continue;

    const amount = amounts[i];
    const w = baselineWindow(values, cfg.iqr_multiplier);
    const z = windowZScore(amount, w, cfg.min_stddev_ratio);

    const rules: AnomalyRule[] = [];
    let severity: AnomalySeverity | null = zSeverity(Math.abs(z), cfg);
    if (severity) rules.push("z_score");

    if (amount < w.iqr_lower || amount > w.iqr_upper) {
      rules.push("iqr");
      // IQR alone implies "low"; a z severity is always at least that
      if (!severity) severity = "low";
    }

    if (!severity) continue;

    out.push(
      Object.freeze({
        date: series[i].date,
        amount,
        baseline_mean: round2(w.mean),
        baseline_stddev: round2(w.stddev),
        baseline_flat: w.stddev === 0,
        z_score: round2(z),
        iqr_lower: round2(w.iqr_lower),
        iqr_upper: round2(w.iqr_upper),
        severity,
        rules: Object.freeze([...rules]),
        reason: reasonText(rules, amount, z, w, cfg.lookback_days),
      })
    );
  }

  return out;
}

/** Positional form: detect(series, lookback_days, min_days). */
export function detect(
  series: readonly DailyCostPoint[],
  lookback_days: number,
  min_days: number,
  overrides: Omit<AnomalyConfigInput, "lookback_days" | "min_days"> = {}
): Anomaly[] {
  return detectAnomalies(series, { ...overrides, lookback_days, min_days });
}
