import { readFileSync } from "node:fs";

import { z } from "zod";

import { addDays, daysBetween } from "../../core/src/dates.js";
import { round2 } from "../../core/src/money.js";
import type {
  DailyCostPoint,
  DateRange,
  RecommendationCandidate,
  ServiceBreakdown,
} from "../../core/src/schema.js";
import {
  RecommendationCandidateSchema,
  ServiceBreakdownSchema,
} from "../../core/src/validate.js";
import type { CostDataProvider } from "./provider.js";

const DemoAccountSchema = z.object({
  base: z.number().positive(),
  drift: z.number(),
  jitter: z.number().nonnegative(),
  services: ServiceBreakdownSchema,
});

const DemoDataSchema = z.object({
  accounts: z.record(z.string().min(1), DemoAccountSchema),
  recommendations: z.array(RecommendationCandidateSchema),
});

export type DemoAccount = z.infer<typeof DemoAccountSchema>;
export type DemoData = z.infer<typeof DemoDataSchema>;

let cached: DemoData | null = null;

export function loadDemoData(): DemoData {
  if (!cached) {
    const raw = readFileSync(new URL("./demo-data.json", import.meta.url), "utf8");
    cached = DemoDataSchema.parse(JSON.parse(raw));
  }
  return cached;
}

/**
 * Deterministic daily spend: a weekly wave, linear drift over `days`
 * and a three-day jitter cycle. Floors at 0.5.
 */
export function demoDailyAmount(
  i: number,
  days: number,
  a: Pick<DemoAccount, "base" | "drift" | "jitter">
): number {
  const wave = ((i % 7) - 3) * 0.12;
  const trend = a.drift * (i / Math.max(days - 1, 1));
  return round2(Math.max(0.5, a.base + a.base * (wave + trend) + a.jitter * ((i % 3) - 1)));
}

export function demoSeries(range: DateRange, account: DemoAccount): DailyCostPoint[] {
  const days = daysBetween(range.start, range.end) + 1;
  const out: DailyCostPoint[] = [];
  for (let i = 0; i < days; i++) {
    out.push({ date: addDays(range.start, i), amount: demoDailyAmount(i, days, account) });
  }
  return out;
}

export type DemoCostProvider = CostDataProvider & {
  accounts(): string[];
  recommendations(): RecommendationCandidate[];
};

/** Offline provider for demos and tests. No network, same output every run. */
export function createDemoCostProvider(opts: { default_account?: string } = {}): DemoCostProvider {
  const data = loadDemoData();
  const fallback = opts.default_account ?? "prod";

  const account = (name?: string): DemoAccount => {
    const key = name === undefined || name === "default" ? fallback : name;
    const a = data.accounts[key];
    if (!a) throw new Error(`unknown demo account "${key}"`);
    return a;
  };

  return {
    name: "demo",
    async fetchDailyCosts(range, account_name) {
      return demoSeries(range, account(account_name));
    },
    async fetchServiceBreakdown(_range, account_name) {
      return { ...account(account_name).services };
    },
    accounts() {
      return Object.keys(data.accounts);
    },
    recommendations() {
      return data.recommendations.map((r) => ({ ...r }));
    },
  };
}
