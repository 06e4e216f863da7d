import { round2 } from "../../core/src/money.js";
import type { Recommendation, RoiSummary } from "../../core/src/schema.js";

type RoiRow = Pick<Recommendation, "status" | "estimated_monthly_savings" | "actual_monthly_savings">;

function clamp(v: number, lo: number, hi: number): number {
  return Math.min(hi, Math.max(lo, v));
}

/**
 * Accuracy of one implemented recommendation, 0..100.
 * null when it cannot be measured (no actual, or a zero estimate).
 */
export function accuracyPct(r: RoiRow): number | null {
  if (r.status !== "implemented") return null;
  if (r.actual_monthly_savings === undefined) return null;
  const e = r.estimated_monthly_savings;
  if (!(e > 0)) return null;
  return clamp(100 * (1 - Math.abs(e - r.actual_monthly_savings) / e), 0, 100);
}

export function computeRoiSummary(rows: readonly RoiRow[]): RoiSummary {
  let pending = 0;
  let implemented = 0;
  let rejected = 0;
  let estimated = 0;
  let implementedEstimated = 0;
  let actual = 0;
  const accuracy: number[] = [];

  for (const r of rows) {
    estimated += r.estimated_monthly_savings;

    if (r.status === "pending") pending++;
    else if (r.status === "rejected") rejected++;
    else {
      implemented++;
      implementedEstimated += r.estimated_monthly_savings;
      if (r.actual_monthly_savings !== undefined) actual += r.actual_monthly_savings;
    }

    const a = accuracyPct(r);
    if (a !== null) accuracy.push(a);
  }

  const total = rows.length;
  const actual_savings_total = round2(actual);

  return {
    total,
    pending,
    implemented,
    rejected,
    implementation_rate_pct: total > 0 ? round2((implemented / total) * 100) : 0,
    estimated_savings_total: round2(estimated),
    implemented_savings_estimated_total: round2(implementedEstimated),
    actual_savings_total,
    annual_projection: round2(actual_savings_total * 12),
    forecast_accuracy_pct:
      accuracy.length > 0 ? round2(accuracy.reduce((s, v) => s + v, 0) / accuracy.length) : null,
  };
}
