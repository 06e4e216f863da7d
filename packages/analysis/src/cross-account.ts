import type { RecommendationCandidate, ServiceBreakdown } from "../../core/src/schema.js";

export type AccountCosts = {
  account_name: string;
  total_cost: number;
  services?: ServiceBreakdown;
};

// highest/lowest spend ratio above which accounts are flagged as imbalanced
export const IMBALANCE_RATIO = 3;

/**
 * Opportunities that only show up when accounts are compared:
 * a lopsided spend split, and services every account pays for separately.
 * Savings are unknown until investigated, so estimates are 0.
 */
export function crossAccountCandidates(accounts: readonly AccountCosts[]): RecommendationCandidate[] {
  const out: RecommendationCandidate[] = [];
  if (accounts.length < 2) return out;

  const ranked = [...accounts].sort(
    (a, b) => b.total_cost - a.total_cost || a.account_name.localeCompare(b.account_name)
  );
  const highest = ranked[0];
  const lowest = ranked[ranked.length - 1];

  if (highest.total_cost > 0 && lowest.total_cost > 0) {
    const ratio = highest.total_cost / lowest.total_cost;
    if (ratio > IMBALANCE_RATIO) {
      out.push({
        title: `${highest.account_name} costs ${ratio.toFixed(1)}x more than ${lowest.account_name}`,
        type: "cost_imbalance",
        estimated_monthly_savings: 0,
        risk_level: "medium",
        effort: "medium",
        account_name: highest.account_name,
        description: "Investigate whether the workload distribution is appropriate",
        idempotency_key: `cross:cost_imbalance:${highest.account_name}:${lowest.account_name}`,
      });
    }
  }

  const withServices = accounts.filter((a) => a.services !== undefined);
  if (withServices.length !== accounts.length) return out;

  const presence = new Map<string, number>();
  for (const a of withServices) {
    for (const service of Object.keys(a.services ?? {})) {
      presence.set(service, (presence.get(service) ?? 0) + 1);
    }
  }

  const shared = [...presence.entries()]
    .filter(([, n]) => n === accounts.length)
    .map(([service]) => service)
    .sort();

  for (const service of shared) {
    out.push({
      title: `${service} used in all accounts`,
      type: "shared_service_opportunity",
      estimated_monthly_savings: 0,
      risk_level: "low",
      effort: "medium",
      description: "Consider shared or centralized resources to reduce duplicate costs",
      idempotency_key: `cross:shared_service:${service}`,
    });
  }

  return out;
}
