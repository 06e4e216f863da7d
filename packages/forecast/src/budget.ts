import type { BudgetConfigInput } from "../../core/src/config.js";
import { BudgetConfigSchema } from "../../core/src/config.js";
import { addDays, todayUtc } from "../../core/src/dates.js";
import { round2 } from "../../core/src/money.js";
import type {
  BudgetAlert,
  BudgetSeverity,
  ForecastResult,
  ISODate,
} from "../../core/src/schema.js";

export type CheckBudgetOptions = {
  /** Day the projection starts from. Defaults to today (UTC). */
  as_of?: ISODate;
  /** Spend already booked against this budget. */
  spent_to_date?: number;
  thresholds?: Omit<BudgetConfigInput, "monthly_budget">;
  now?: () => Date;
};

export function budgetSeverity(
  overage_pct: number,
  t: { low_below_pct: number; high_above_pct: number }
): BudgetSeverity {
  if (overage_pct <= 0) return "none";
  if (overage_pct < t.low_below_pct) return "low";
  if (overage_pct <= t.high_above_pct) return "medium";
  return "high";
}

/**
 * Days until cumulative spend at `daily_rate` reaches the remaining budget.
 * null when the rate never gets there within `horizon_days`.
 */
export function daysUntilBreach(
  remaining: number,
  daily_rate: number,
  horizon_days: number
): number | null {
  if (remaining <= 0) return 0;
  if (!(daily_rate > 0)) return null;
  const days = Math.ceil(remaining / daily_rate);
  return days <= horizon_days ? days : null;
}

export function checkBudget(
  forecast: ForecastResult,
  monthly_budget: number,
  current_daily_rate: number,
  opts: CheckBudgetOptions = {}
): BudgetAlert {
  const cfg = BudgetConfigSchema.parse({ ...opts.thresholds, monthly_budget });

  const overage = round2(forecast.projected_total - cfg.monthly_budget);
  const overage_pct = round2((overage * 100) / cfg.monthly_budget);
  const severity = budgetSeverity(overage_pct, cfg);

  const alert: BudgetAlert = {
    monthly_budget: cfg.monthly_budget,
    projected_spend: forecast.projected_total,
    overage,
    overage_pct,
    severity,
  };

  if (overage > 0) {
    const remaining = cfg.monthly_budget - Math.max(0, opts.spent_to_date ?? 0);
    const days = daysUntilBreach(remaining, current_daily_rate, forecast.horizon_days);
    if (days !== null) {
      const as_of = opts.as_of ?? todayUtc(opts.now);
      alert.days_until_breach = days;
      alert.breach_date = addDays(as_of, days);
    }
  }

  return alert;
}
