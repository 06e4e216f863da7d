export { explainForecast, explainBudget } from "./explain-forecast.js";
export { explainAnomalies } from "./explain-anomaly.js";
export type { AnomalyExplanation } from "./explain-anomaly.js";

export { buildForecastPrompt } from "./prompt.js";
export type { NarrativePrompt, NarrativePromptInput } from "./prompt.js";

export { renderLines } from "./lines.js";
export type { ExplanationLine } from "./lines.js";
