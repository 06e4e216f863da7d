export {
  detectAnomalies,
  detect,
  baselineWindow,
  windowZScore,
  minBaselinePoints,
} from "./detector.js";
export type { BaselineWindow } from "./detector.js";

export { summarizeAnomalies } from "./summary.js";
export type { AnomalySummary, AnomalyRunStatus } from "./summary.js";
