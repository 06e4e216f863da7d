export type { CostDataProvider } from "./provider.js";
export { loadDailyCosts, loadServiceBreakdown } from "./provider.js";

export {
  createDemoCostProvider,
  loadDemoData,
  demoDailyAmount,
  demoSeries,
} from "./demo-provider.js";
export type { DemoAccount, DemoData, DemoCostProvider } from "./demo-provider.js";

export { crossAccountCandidates, IMBALANCE_RATIO } from "./cross-account.js";
export type { AccountCosts } from "./cross-account.js";

export { runAnalysis, analysisRange } from "./orchestrator.js";
export type { AnalysisReport, AnalysisMeta, RunAnalysisInput } from "./orchestrator.js";

export { aggregateServices, rankServices } from "../../core/src/breakdown.js";
