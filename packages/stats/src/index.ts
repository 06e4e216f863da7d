// ---------- Descriptive statistics (stable public API) ----------
export {
  mean,
  sampleStdDev,
  populationStdDev,
  quantile,
  quartiles,
  iqrBounds,
  describe,
} from "./descriptive.js";

export type {
  Quartiles,
  IqrBounds,
  SeriesStats,
} from "./descriptive.js";

// ---------- Regression (stable public API) ----------
export {
  fitLinearRegression,
  predict,
  indexedPoints,
} from "./regression.js";

export type {
  RegressionPoint,
  RegressionModel,
} from "./regression.js";

export { round2 } from "../../core/src/money.js";
