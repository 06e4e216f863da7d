import { round2 } from "../../core/src/money.js";
import type { Anomaly, AnomalySeverity, DailyCostPoint } from "../../core/src/schema.js";
import { mean, sampleStdDev } from "../../stats/src/descriptive.js";

export type AnomalyRunStatus = "insufficient_data" | "none" | "anomalies";

export type AnomalySummary = {
  status: AnomalyRunStatus;
  days_analyzed: number;
  min_days: number;
  average_daily: number | null;
  stddev: number | null;
  counts_by_severity: Record<AnomalySeverity, number>;
  latest: Anomaly | null;
};

/**
 * Lets callers tell "nothing unusual" apart from "not enough history",
 * which detectAnomalies deliberately reports the same way (an empty list).
 */
export function summarizeAnomalies(
  series: readonly DailyCostPoint[],
  anomalies: readonly Anomaly[],
  min_days: number
): AnomalySummary {
  const counts: Record<AnomalySeverity, number> = { low: 0, medium: 0, high: 0 };
  for (const a of anomalies) counts[a.severity] += 1;

  const amounts = series.map((p) => p.amount);
  const status: AnomalyRunStatus =
    series.length < min_days ? "insufficient_data" : anomalies.length > 0 ? "anomalies" : "none";

  return {
    status,
    days_analyzed: series.length,
    min_days,
    average_daily: amounts.length > 0 ? round2(mean(amounts)) : null,
    stddev: amounts.length > 0 ? round2(sampleStdDev(amounts)) : null,
    counts_by_severity: counts,
    latest: anomalies.length > 0 ? anomalies[anomalies.length - 1] : null,
  };
}
