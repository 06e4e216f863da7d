export type * from "./schema.js";

export {
  SpendError,
  InsufficientDataError,
  InvalidTransitionError,
  NotFoundError,
  ExternalProviderError,
  InvalidSeriesError,
  errorMessage,
} from "./errors.js";
export type { SpendErrorCode } from "./errors.js";

export {
  isIsoDate,
  toEpochDay,
  fromEpochDay,
  addDays,
  daysBetween,
  todayUtc,
} from "./dates.js";

export {
  DailyCostPointSchema,
  DailyCostSeriesSchema,
  ServiceBreakdownSchema,
  DateRangeSchema,
  RecommendationCandidateSchema,
  RecommendationSchema,
  ResolveInputSchema,
  CostSnapshotInputSchema,
  parseDailyCostSeries,
  parseServiceBreakdown,
  parseRecommendationCandidate,
} from "./validate.js";
export type { ParsedCandidate, ParsedCostSnapshotInput } from "./validate.js";

export { checkSeriesInvariants, assertSeries } from "./invariants.js";
export type { SeriesViolation, SeriesViolationCode } from "./invariants.js";

export {
  AnomalyConfigSchema,
  ForecastConfigSchema,
  BudgetConfigSchema,
  AnalysisConfigSchema,
  parseAnomalyConfig,
  parseForecastConfig,
  parseAnalysisConfig,
  analysisConfigFromEnv,
} from "./config.js";
export type {
  AnomalyConfig,
  AnomalyConfigInput,
  ForecastConfig,
  ForecastConfigInput,
  BudgetConfig,
  BudgetConfigInput,
  AnalysisConfig,
  AnalysisConfigInput,
  EnvConfig,
} from "./config.js";

export { consoleLogger, silentLogger } from "./log.js";
export type { Logger, LogLevel } from "./log.js";

export { round2 } from "./money.js";

export { rankServices, aggregateServices } from "./breakdown.js";
export type { RankedService, ServiceBreakdownSummary } from "./breakdown.js";
