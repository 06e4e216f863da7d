export {
  forecast,
  seriesToPoints,
  growthRatePct,
  classifyTrend,
  classifyConfidence,
  volatilityPct,
  MIN_FORECAST_POINTS,
} from "./forecaster.js";

export { checkBudget, budgetSeverity, daysUntilBreach } from "./budget.js";
export type { CheckBudgetOptions } from "./budget.js";

export {
  withTimeout,
  narrateForecast,
  forecastWithNarrative,
  createPromptNarrator,
  DEFAULT_NARRATIVE_TIMEOUT_MS,
} from "./narrative.js";
export type {
  ForecastNarrator,
  TextGenerationProvider,
  NarrativeContext,
  NarrativeOutcome,
  ForecastWithNarrative,
} from "./narrative.js";
