/**
 * Spend forecasting.
 *
 * Fits an OLS line over (day offset, amount) for the whole available history
 * and evaluates it at the middle of the forecast horizon. Offsets are calendar
 * days from the first point, so gaps stretch the x axis instead of being
 * filled in.
 */

import type { ForecastConfig, ForecastConfigInput } from "../../core/src/config.js";
import { parseForecastConfig } from "../../core/src/config.js";
import { toEpochDay } from "../../core/src/dates.js";
import { InsufficientDataError } from "../../core/src/errors.js";
import { assertSeries } from "../../core/src/invariants.js";
import { round2 } from "../../core/src/money.js";
import type {
  Confidence,
  DailyCostPoint,
  ForecastResult,
  Trend,
} from "../../core/src/schema.js";
import { mean, sampleStdDev } from "../../stats/src/descriptive.js";
import type { RegressionModel, RegressionPoint } from "../../stats/src/regression.js";
import { fitLinearRegression, predict } from "../../stats/src/regression.js";

export const MIN_FORECAST_POINTS = 2;

export function seriesToPoints(series: readonly DailyCostPoint[]): RegressionPoint[] {
  if (series.length === 0) return [];
  const first = toEpochDay(series[0].date);
  return series.map((p) => ({ x: toEpochDay(p.date) - first, y: p.amount }));
}

/**
 * Percentage change the fitted slope implies across the observed span,
 * relative to the fitted starting level (or the mean when that is not positive).
 */
export function growthRatePct(model: RegressionModel, span_days: number, seriesMean: number): number {
  const base = model.intercept > 0 ? model.intercept : seriesMean;
  if (!(base > 0)) return 0;
  return ((model.slope * span_days) / base) * 100;
}

export function classifyTrend(growth_rate_pct: number, stable_band_pct: number): Trend {
  if (growth_rate_pct > stable_band_pct) return "increasing";
  if (growth_rate_pct < -stable_band_pct) return "decreasing";
  return "stable";
}

export function classifyConfidence(
  volatility_pct: number,
  history_days: number,
  cfg: Pick<ForecastConfig, "min_history_for_high_confidence">
): Confidence {
  if (volatility_pct < 10 && history_days >= cfg.min_history_for_high_confidence) return "high";
  if (volatility_pct < 25) return "medium";
  return "low";
}

/** Coefficient of variation of the raw daily amounts, in percent. */
export function volatilityPct(amounts: readonly number[]): number {
  const m = mean(amounts);
  return m > 0 ? (sampleStdDev(amounts) / m) * 100 : 0;
}

export function forecast(
  series: readonly DailyCostPoint[],
  config: ForecastConfigInput = {}
): ForecastResult {
  const cfg = parseForecastConfig(config);
  if (series.length < MIN_FORECAST_POINTS) {
    throw new InsufficientDataError(MIN_FORECAST_POINTS, series.length, "forecast");
  }
  assertSeries(series);

  const points = seriesToPoints(series);
  const model = fitLinearRegression(points);
  const amounts = series.map((p) => p.amount);

  const xLast = points[points.length - 1].x;
  const xMid = xLast + (cfg.horizon_days + 1) / 2;
  const daily_average = round2(Math.max(0, predict(model, xMid)));

  const growth = growthRatePct(model, xLast, mean(amounts));
  const volatility = volatilityPct(amounts);

  return {
    horizon_days: cfg.horizon_days,
    projected_total: round2(daily_average * cfg.horizon_days),
    daily_average,
    trend: classifyTrend(growth, cfg.stable_band_pct),
    growth_rate_pct: round2(growth),
    volatility_pct: round2(volatility),
    confidence: classifyConfidence(volatility, series.length, cfg),
    history_days: series.length,
    slope: model.slope,
    intercept: model.intercept,
  };
}
