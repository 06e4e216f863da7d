import type { Recommendation } from "../../core/src/schema.js";

/** Pending, low risk, low effort: eligible for lightweight automated follow-up. */
export function isQuickWin(r: Recommendation): boolean {
  return r.status === "pending" && r.risk_level === "low" && r.effort === "quick_win";
}

export function selectQuickWins(recs: readonly Recommendation[], limit?: number): Recommendation[] {
  const out = recs
    .filter(isQuickWin)
    .sort((a, b) => b.estimated_monthly_savings - a.estimated_monthly_savings || a.id - b.id);
  return typeof limit === "number" ? out.slice(0, limit) : out;
}
