/**
 * One analysis pass over an account:
 *   provider -> anomalies + forecast (+ budget, narrative) -> ledger ROI
 *
 * Provider, too-short history and narrator failures degrade the report
 * (recorded in `degraded`); ledger errors propagate.
 */

import { detectAnomalies } from "../../anomaly/src/detector.js";
import type { AnomalySummary } from "../../anomaly/src/summary.js";
import { summarizeAnomalies } from "../../anomaly/src/summary.js";
import type { ServiceBreakdownSummary } from "../../core/src/breakdown.js";
import { rankServices } from "../../core/src/breakdown.js";
import type { AnalysisConfigInput } from "../../core/src/config.js";
import { parseAnalysisConfig } from "../../core/src/config.js";
import { addDays, todayUtc } from "../../core/src/dates.js";
import { ExternalProviderError, InsufficientDataError } from "../../core/src/errors.js";
import type { Logger } from "../../core/src/log.js";
import { silentLogger } from "../../core/src/log.js";
import type {
  Anomaly,
  BudgetAlert,
  DailyCostPoint,
  DateRange,
  ForecastResult,
  ISODate,
  Recommendation,
  RoiSummary,
} from "../../core/src/schema.js";
import { checkBudget } from "../../forecast/src/budget.js";
import { forecast as runForecast } from "../../forecast/src/forecaster.js";
import type { ForecastNarrator } from "../../forecast/src/narrative.js";
import { narrateForecast } from "../../forecast/src/narrative.js";
import type { SavingsLedger } from "../../ledger/src/store.js";
import type { CostDataProvider } from "./provider.js";
import { loadDailyCosts, loadServiceBreakdown } from "./provider.js";

export type AnalysisMeta = {
  provider: string;
  account_name: string;
  as_of: ISODate;
  range: DateRange;
  generated_at: string;
};

export type AnalysisReport = {
  meta: AnalysisMeta;
  series: DailyCostPoint[];
  services: ServiceBreakdownSummary | null;
  anomalies: Anomaly[];
  anomaly_summary: AnomalySummary;
  forecast: ForecastResult | null;
  budget: BudgetAlert | null;
  narrative: string | null;
  roi: RoiSummary | null;
  quick_wins: Recommendation[];
  degraded: string[];
};

export type RunAnalysisInput = {
  provider: CostDataProvider;
  ledger?: SavingsLedger;
  narrator?: ForecastNarrator;
  config?: AnalysisConfigInput;
  account_name?: string;
  logger?: Logger;
  now?: () => Date;
};

/** The last `days` complete days before `as_of`. */
export function analysisRange(as_of: ISODate, days: number): DateRange {
  return { start: addDays(as_of, -days), end: addDays(as_of, -1) };
}

export async function runAnalysis(input: RunAnalysisInput): Promise<AnalysisReport> {
  const cfg = parseAnalysisConfig(input.config);
  const logger = input.logger ?? silentLogger;
  const now = input.now ?? (() => new Date());
  const account_name = input.account_name ?? "default";

  const as_of = todayUtc(now);
  const range = analysisRange(as_of, cfg.days_to_analyze);
  const degraded: string[] = [];

  const degrade = (what: string, e: Error) => {
    degraded.push(`${what}: ${e.message}`);
    logger.warn(`${what} unavailable: ${e.message}`);
  };

  let series: DailyCostPoint[] = [];
  try {
    series = await loadDailyCosts(input.provider, range, { account_name, as_of });
  } catch (e) {
    if (!(e instanceof ExternalProviderError)) throw e;
    degrade("cost data", e);
  }

  let services: ServiceBreakdownSummary | null = null;
  try {
    const breakdown = await loadServiceBreakdown(input.provider, range, { account_name });
    services = rankServices(breakdown, cfg.top_services);
  } catch (e) {
    if (!(e instanceof ExternalProviderError)) throw e;
    degrade("service breakdown", e);
  }

  const anomalies = detectAnomalies(series, cfg.anomaly);
  const anomaly_summary = summarizeAnomalies(series, anomalies, cfg.anomaly.min_days);

  let forecast: ForecastResult | null = null;
  try {
    forecast = runForecast(series, cfg.forecast);
  } catch (e) {
    if (!(e instanceof InsufficientDataError)) throw e;
    degrade("forecast", e);
  }

  let budget: BudgetAlert | null = null;
  if (forecast && cfg.monthly_budget !== undefined) {
    budget = checkBudget(forecast, cfg.monthly_budget, forecast.daily_average, { as_of });
    if (budget.severity !== "none") {
      logger.warn(`budget ${budget.severity}: projected ${budget.projected_spend} vs ${budget.monthly_budget}`);
    }
  }

  let narrative: string | null = null;
  if (forecast && input.narrator) {
    const outcome = await narrateForecast(
      input.narrator,
      forecast,
      { budget, services, anomalies },
      { timeout_ms: cfg.narrative_timeout_ms, logger }
    );
    narrative = outcome.narrative;
    if (outcome.error) degraded.push(`narrative: ${outcome.error.message}`);
  }

  let roi: RoiSummary | null = null;
  let quick_wins: Recommendation[] = [];
  if (input.ledger) {
    roi = await input.ledger.summary();
    quick_wins = await input.ledger.quickWins(cfg.quick_win_limit);
  }

  logger.info(
    `analysis ${account_name} ${range.start}..${range.end}: ${series.length} days, ` +
      `${anomalies.length} anomalies, ${degraded.length} degraded`
  );

  return {
    meta: {
      provider: input.provider.name,
      account_name,
      as_of,
      range,
      generated_at: now().toISOString(),
    },
    series,
    services,
    anomalies,
    anomaly_summary,
    forecast,
    budget,
    narrative,
    roi,
    quick_wins,
    degraded,
  };
}
