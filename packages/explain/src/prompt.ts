import type { ServiceBreakdownSummary } from "../../core/src/breakdown.js";
import type { Anomaly, BudgetAlert, ForecastResult } from "../../core/src/schema.js";
import { explainBudget, explainForecast } from "./explain-forecast.js";
import { money } from "./lines.js";

export type NarrativePromptInput = {
  forecast: ForecastResult;
  budget?: BudgetAlert | null;
  services?: ServiceBreakdownSummary | null;
  anomalies?: readonly Anomaly[];
};

export type NarrativePrompt = {
  system: string;
  prompt: string;
};

const SYSTEM =
  "You are a FinOps analyst. Explain the cost forecast below in plain language. " +
  "Use only the figures given; do not recompute or invent numbers.";

/**
 * The numbers are rendered from explanation lines, so the narrator sees exactly
 * what the engines computed.
 */
export function buildForecastPrompt(input: NarrativePromptInput): NarrativePrompt {
  const out: string[] = [];

  out.push(`FORECAST (${input.forecast.horizon_days} days):`);
  for (const l of explainForecast(input.forecast)) out.push(`- ${l.text}`);

  if (input.budget) {
    out.push("", "BUDGET:");
    for (const l of explainBudget(input.budget)) out.push(`- ${l.text}`);
  }

  if (input.services && input.services.services.length > 0) {
    out.push("", "TOP SERVICES:");
    input.services.services.forEach((s, i) => {
      out.push(`${i + 1}. ${s.service}: ${money(s.amount)} (${s.share_pct.toFixed(1)}%)`);
    });
  }

  if (input.anomalies && input.anomalies.length > 0) {
    out.push("", "RECENT ANOMALIES:");
    for (const a of input.anomalies.slice(-5)) {
      out.push(`- ${a.date}: ${money(a.amount)} (${a.severity}; ${a.reason})`);
    }
  }

  out.push(
    "",
    "Cover: whether spend will rise, fall or hold; the main risk factors; " +
      "early warning signs to watch; and cost control actions if the forecast holds."
  );

  return { system: SYSTEM, prompt: out.join("\n") };
}
