// Cloud Spend Schema v1
// Types only. No functions.

export type ISODate = string; // "YYYY-MM-DD"
export type ISO8601 = string;

/* ----------------------------- Cost input ----------------------------- */

export interface DailyCostPoint {
  date: ISODate;
  amount: number;
}

// service name -> spend for one period
export type ServiceBreakdown = Record<string, number>;

export interface DateRange {
  start: ISODate; // inclusive
  end: ISODate; // inclusive
}

/* ------------------------------ Anomalies ----------------------------- */

export type AnomalySeverity = "low" | "medium" | "high";

export type AnomalyRule = "z_score" | "iqr";

export interface Anomaly {
  date: ISODate;
  amount: number;

  baseline_mean: number;
  baseline_stddev: number;
  /** window stddev was exactly 0; z was scored against the floor */
  baseline_flat: boolean;
  z_score: number;

  iqr_lower: number;
  iqr_upper: number;

  severity: AnomalySeverity;
  rules: readonly AnomalyRule[];
  reason: string;
}

/* ------------------------------ Forecast ------------------------------ */

export type Trend = "increasing" | "decreasing" | "stable";
export type Confidence = "low" | "medium" | "high";

export interface ForecastResult {
  horizon_days: number;
  projected_total: number;
  daily_average: number;

  trend: Trend;
  growth_rate_pct: number;
  volatility_pct: number;
  confidence: Confidence;

  // fitted model, exposed for explanation
  history_days: number;
  slope: number;
  intercept: number;
}

export type BudgetSeverity = "none" | "low" | "medium" | "high";

export interface BudgetAlert {
  monthly_budget: number;
  projected_spend: number;
  overage: number; // negative = under budget
  overage_pct: number;
  severity: BudgetSeverity;
  days_until_breach?: number;
  breach_date?: ISODate;
}

/* --------------------------- Recommendations -------------------------- */

export type RiskLevel = "low" | "medium" | "high";
export type Effort = "quick_win" | "medium" | "large";
export type RecommendationStatus = "pending" | "implemented" | "rejected";
export type ResolvedStatus = Exclude<RecommendationStatus, "pending">;

export interface Recommendation {
  id: number;
  title: string;
  type: string;
  estimated_monthly_savings: number;
  risk_level: RiskLevel;
  effort: Effort;
  status: RecommendationStatus;
  created_at: ISO8601;
  resolved_at?: ISO8601;
  actual_monthly_savings?: number;
  notes?: string;

  account_name: string;
  description?: string;
  idempotency_key?: string;
}

export interface RecommendationCandidate {
  title: string;
  type: string;
  estimated_monthly_savings: number;
  risk_level?: RiskLevel;
  effort?: Effort;
  account_name?: string;
  description?: string;
  idempotency_key?: string;
}

export interface RoiSummary {
  total: number;
  pending: number;
  implemented: number;
  rejected: number;
  implementation_rate_pct: number;
  estimated_savings_total: number;
  implemented_savings_estimated_total: number;
  actual_savings_total: number;
  annual_projection: number;
  forecast_accuracy_pct: number | null;
}

/* ---------------------------- Cost snapshots --------------------------- */

export interface CostSnapshot {
  id: number;
  snapshot_date: ISODate;
  account_name: string;
  total_cost: number;
  period_days: number;
  service_breakdown?: ServiceBreakdown;
}

export type CostSnapshotInput = Omit<CostSnapshot, "id" | "snapshot_date" | "account_name"> & {
  snapshot_date?: ISODate;
  account_name?: string;
};
