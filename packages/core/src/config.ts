import { z } from "zod";

/* ------------------------------------------------------------------ */
/*                          Engine config records                     */
/* ------------------------------------------------------------------ */

export const AnomalyConfigSchema = z.object({
  lookback_days: z.number().int().positive().default(14),
  min_days: z.number().int().positive().default(7),

  z_threshold: z.number().positive().default(2),
  high_z_threshold: z.number().positive().default(3),
  iqr_multiplier: z.number().positive().default(1.5),

  // stddev floor for flat baselines, as a fraction of the baseline mean
  min_stddev_ratio: z.number().positive().default(0.01),
});

export type AnomalyConfig = z.infer<typeof AnomalyConfigSchema>;
export type AnomalyConfigInput = z.input<typeof AnomalyConfigSchema>;

export const ForecastConfigSchema = z.object({
  horizon_days: z.number().int().positive().default(30),
  // neutral band for trend classification, in percent
  stable_band_pct: z.number().nonnegative().default(1),
  min_history_for_high_confidence: z.number().int().positive().default(14),
});

export type ForecastConfig = z.infer<typeof ForecastConfigSchema>;
export type ForecastConfigInput = z.input<typeof ForecastConfigSchema>;

export const BudgetConfigSchema = z.object({
  monthly_budget: z.number().positive(),
  low_below_pct: z.number().nonnegative().default(5),
  high_above_pct: z.number().nonnegative().default(15),
});

export type BudgetConfig = z.infer<typeof BudgetConfigSchema>;
export type BudgetConfigInput = z.input<typeof BudgetConfigSchema>;

export const AnalysisConfigSchema = z.object({
  days_to_analyze: z.number().int().positive().default(30),
  anomaly: AnomalyConfigSchema.default(() => AnomalyConfigSchema.parse({})),
  forecast: ForecastConfigSchema.default(() => ForecastConfigSchema.parse({})),
  monthly_budget: z.number().positive().optional(),
  narrative_timeout_ms: z.number().int().positive().default(10_000),
  top_services: z.number().int().positive().default(5),
  quick_win_limit: z.number().int().positive().default(5),
});

export type AnalysisConfig = z.infer<typeof AnalysisConfigSchema>;
export type AnalysisConfigInput = z.input<typeof AnalysisConfigSchema>;

export function parseAnomalyConfig(input: AnomalyConfigInput = {}): AnomalyConfig {
  return AnomalyConfigSchema.parse(input);
}

export function parseForecastConfig(input: ForecastConfigInput = {}): ForecastConfig {
  return ForecastConfigSchema.parse(input);
}

export function parseAnalysisConfig(input: AnalysisConfigInput = {}): AnalysisConfig {
  return AnalysisConfigSchema.parse(input);
}

/* ------------------------------------------------------------------ */
/*                         Process-edge loading                       */
/* ------------------------------------------------------------------ */

const EnvNumber = z.coerce.number().refine(Number.isFinite, "Must be a number");

const EnvSchema = z.object({
  SPEND_LOOKBACK_DAYS: EnvNumber.optional(),
  SPEND_MIN_DAYS: EnvNumber.optional(),
  SPEND_FORECAST_DAYS: EnvNumber.optional(),
  SPEND_MONTHLY_BUDGET: EnvNumber.optional(),
  SPEND_NARRATIVE_TIMEOUT_MS: EnvNumber.optional(),
  SPEND_DAYS_TO_ANALYZE: EnvNumber.optional(),
  SPEND_LEDGER_PATH: z.string().min(1).optional(),
});

export type EnvConfig = {
  analysis: AnalysisConfig;
  ledger_path: string;
};

/**
 * Only the process edge (examples, scripts) should call this.
 * Engines take explicit config records.
 */
export function analysisConfigFromEnv(
  env: Record<string, string | undefined>,
  defaults: { ledger_path?: string } = {}
): EnvConfig {
  const e = EnvSchema.parse(env);

  const analysis = parseAnalysisConfig({
    days_to_analyze: e.SPEND_DAYS_TO_ANALYZE,
    anomaly: {
      lookback_days: e.SPEND_LOOKBACK_DAYS,
      min_days: e.SPEND_MIN_DAYS,
    },
    forecast: { horizon_days: e.SPEND_FORECAST_DAYS },
    monthly_budget: e.SPEND_MONTHLY_BUDGET,
    narrative_timeout_ms: e.SPEND_NARRATIVE_TIMEOUT_MS,
  });

  return {
    analysis,
    ledger_path: e.SPEND_LEDGER_PATH ?? defaults.ledger_path ?? "data/savings-ledger.sqlite",
  };
}
