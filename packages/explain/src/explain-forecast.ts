import type { BudgetAlert, ForecastResult } from "../../core/src/schema.js";
import type { ExplanationLine } from "./lines.js";
import { fmt, money, signedPct } from "./lines.js";

export function explainForecast(f: ForecastResult): ExplanationLine[] {
  const lines: ExplanationLine[] = [];
  lines.push({ kind: "INPUT", text: `History: ${f.history_days} daily points` });
  lines.push({ kind: "INPUT", text: `Horizon: ${f.horizon_days} days` });

  lines.push({
    kind: "COMPUTE",
    text: `Fitted line: amount = ${fmt(f.slope)} * day + ${fmt(f.intercept)}`,
  });
  lines.push({
    kind: "COMPUTE",
    text: `Daily average = line at horizon midpoint = ${money(f.daily_average)}`,
  });
  lines.push({
    kind: "COMPUTE",
    text: `Projected total = ${money(f.daily_average)} * ${f.horizon_days} = ${money(f.projected_total)}`,
  });

  lines.push({
    kind: "RESULT",
    text: `Trend ${f.trend} (${signedPct(f.growth_rate_pct)} over the observed history)`,
  });
  lines.push({
    kind: "RESULT",
    text: `Volatility ${f.volatility_pct.toFixed(1)}%, confidence ${f.confidence}`,
  });

  if (f.history_days < 14) {
    lines.push({ kind: "NOTE", text: `Short history (${f.history_days} points); treat the trend as indicative` });
  }
  if (f.slope < 0 && f.daily_average === 0) {
    lines.push({ kind: "NOTE", text: "Fitted line falls below zero within the horizon; clamped to 0" });
  }

  return lines;
}

export function explainBudget(a: BudgetAlert): ExplanationLine[] {
  const lines: ExplanationLine[] = [
    { kind: "INPUT", text: `Monthly budget ${money(a.monthly_budget)}` },
    { kind: "INPUT", text: `Projected spend ${money(a.projected_spend)}` },
  ];

  if (a.overage > 0) {
    lines.push({
      kind: "RESULT",
      text: `Over budget by ${money(a.overage)} (${a.overage_pct.toFixed(1)}%), severity ${a.severity}`,
    });
    if (a.days_until_breach !== undefined && a.breach_date !== undefined) {
      lines.push({
        kind: "RESULT",
        text: `Budget reached in ${a.days_until_breach} days (${a.breach_date})`,
      });
    } else {
      lines.push({ kind: "NOTE", text: "Current daily rate does not reach the budget within the horizon" });
    }
  } else {
    lines.push({
      kind: "RESULT",
      text: `Within budget by ${money(-a.overage)} (${Math.abs(a.overage_pct).toFixed(1)}% under)`,
    });
  }

  return lines;
}
