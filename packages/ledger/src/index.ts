export type {
  SavingsLedger,
  RecommendationFilter,
  CostSnapshotFilter,
  LedgerOptions,
} from "./store.js";

export { SqliteSavingsLedger, MIGRATIONS } from "./sqlite-ledger.js";
export { InMemorySavingsLedger } from "./in-memory-ledger.js";

export { transitionRecommendation, isResolved } from "./state-machine.js";
export type { ResolveInput } from "./state-machine.js";

export { computeRoiSummary, accuracyPct } from "./roi.js";
export { isQuickWin, selectQuickWins } from "./quick-wins.js";
