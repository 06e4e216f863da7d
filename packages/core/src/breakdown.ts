import { round2 } from "./money.js";
import type { ServiceBreakdown } from "./schema.js";

export type RankedService = {
  service: string;
  amount: number;
  share_pct: number; // of the breakdown total, 0..100
};

export type ServiceBreakdownSummary = {
  total: number;
  service_count: number;
  top_service: string | null;
  services: RankedService[];
};

/**
 * Rank services by spend, largest first.
 * Ties are broken by name so output does not depend on insertion order.
 */
export function rankServices(breakdown: ServiceBreakdown, top_n?: number): ServiceBreakdownSummary {
  const entries = Object.entries(breakdown).sort((a, b) => b[1] - a[1] || a[0].localeCompare(b[0]));
  const total = entries.reduce((s, [, v]) => s + v, 0);

  const services = entries.map(([service, amount]) => ({
    service,
    amount: round2(amount),
    share_pct: total > 0 ? round2((amount / total) * 100) : 0,
  }));

  return {
    total: round2(total),
    service_count: entries.length,
    top_service: entries.length > 0 ? entries[0][0] : null,
    services: typeof top_n === "number" ? services.slice(0, top_n) : services,
  };
}

/** Combine per-account breakdowns into one, summing shared services. */
export function aggregateServices(breakdowns: Iterable<ServiceBreakdown>): ServiceBreakdown {
  const combined = new Map<string, number>();
  for (const b of breakdowns) {
    for (const [service, amount] of Object.entries(b)) {
      combined.set(service, (combined.get(service) ?? 0) + amount);
    }
  }

  const out: ServiceBreakdown = {};
  for (const [service, amount] of [...combined.entries()].sort(
    (a, b) => b[1] - a[1] || a[0].localeCompare(b[0])
  )) {
    out[service] = round2(amount);
  }
  return out;
}
