import { z } from "zod";

import { isIsoDate } from "./dates.js";

/* ------------------------------------------------------------------ */
/*                              Primitives                            */
/* ------------------------------------------------------------------ */

export const ISODateSchema = z.string().refine(isIsoDate, "Invalid YYYY-MM-DD date");

const ISO8601 = z
  .string()
  .refine((v) => !Number.isNaN(Date.parse(v)), "Invalid ISO-8601 timestamp");

const Money = z
  .number()
  .refine(Number.isFinite, "Must be a finite number")
  .refine((v) => v >= 0, "Must be non-negative");

/* ------------------------------------------------------------------ */
/*                              Cost input                            */
/* ------------------------------------------------------------------ */

export const DailyCostPointSchema = z.object({
  date: ISODateSchema,
  amount: Money,
});

export const DailyCostSeriesSchema = z.array(DailyCostPointSchema);

export const ServiceBreakdownSchema = z.record(z.string().min(1), Money);

export const DateRangeSchema = z
  .object({ start: ISODateSchema, end: ISODateSchema })
  .refine((r) => r.start <= r.end, "start must not be after end");

/* ------------------------------------------------------------------ */
/*                           Recommendations                          */
/* ------------------------------------------------------------------ */

export const RiskLevelSchema = z.enum(["low", "medium", "high"]);
export const EffortSchema = z.enum(["quick_win", "medium", "large"]);
export const StatusSchema = z.enum(["pending", "implemented", "rejected"]);
export const ResolvedStatusSchema = z.enum(["implemented", "rejected"]);

export const RecommendationCandidateSchema = z.object({
  title: z.string().min(1),
  type: z.string().min(1),
  estimated_monthly_savings: Money,
  risk_level: RiskLevelSchema.default("medium"),
  effort: EffortSchema.default("medium"),
  account_name: z.string().min(1).default("default"),
  description: z.string().optional(),
  idempotency_key: z.string().min(1).optional(),
});

export type ParsedCandidate = z.infer<typeof RecommendationCandidateSchema>;

// any number: ids that match no row surface as NotFoundError at lookup
export const ResolveInputSchema = z.object({
  id: z.number(),
  status: ResolvedStatusSchema,
  actual_savings: Money.optional(),
  notes: z.string().optional(),
});

export const RecommendationSchema = z.object({
  id: z.number().int().positive(),
  title: z.string(),
  type: z.string(),
  estimated_monthly_savings: Money,
  risk_level: RiskLevelSchema,
  effort: EffortSchema,
  status: StatusSchema,
  created_at: ISO8601,
  resolved_at: ISO8601.optional(),
  actual_monthly_savings: Money.optional(),
  notes: z.string().optional(),
  account_name: z.string(),
  description: z.string().optional(),
  idempotency_key: z.string().optional(),
});

/* ------------------------------------------------------------------ */
/*                            Cost snapshots                          */
/* ------------------------------------------------------------------ */

export const CostSnapshotInputSchema = z.object({
  snapshot_date: ISODateSchema.optional(),
  account_name: z.string().min(1).default("default"),
  total_cost: Money,
  period_days: z.number().int().positive(),
  service_breakdown: ServiceBreakdownSchema.optional(),
});

export type ParsedCostSnapshotInput = z.infer<typeof CostSnapshotInputSchema>;

/* ------------------------------------------------------------------ */
/*                               Parsers                              */
/* ------------------------------------------------------------------ */

export function parseDailyCostSeries(input: unknown) {
  return DailyCostSeriesSchema.parse(input);
}

export function parseServiceBreakdown(input: unknown) {
  return ServiceBreakdownSchema.parse(input);
}

export function parseRecommendationCandidate(input: unknown): ParsedCandidate {
  return RecommendationCandidateSchema.parse(input);
}
