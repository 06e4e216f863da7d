import { describe, expect, it } from "vitest";

import type { Anomaly, BudgetAlert, ForecastResult } from "../../core/src/schema.js";
import { explainAnomalies } from "../src/explain-anomaly.js";
import { explainBudget, explainForecast } from "../src/explain-forecast.js";
import { renderLines } from "../src/lines.js";
import { buildForecastPrompt } from "../src/prompt.js";

const ramp: ForecastResult = {
  horizon_days: 30,
  projected_total: 3765,
  daily_average: 125.5,
  trend: "increasing",
  growth_rate_pct: 35.8,
  volatility_pct: 9.22,
  confidence: "high",
  history_days: 30,
  slope: 1,
  intercept: 81,
};

const overBudget: BudgetAlert = {
  monthly_budget: 2500,
  projected_spend: 2850,
  overage: 350,
  overage_pct: 14,
  severity: "medium",
  days_until_breach: 27,
  breach_date: "2026-03-28",
};

const spike: Anomaly = {
  date: "2026-01-08",
  amount: 500,
  baseline_mean: 100,
  baseline_stddev: 0,
  baseline_flat: true,
  z_score: 400,
  iqr_lower: 100,
  iqr_upper: 100,
  severity: "high",
  rules: ["z_score", "iqr"],
  reason: "spike: z-score 400.00 vs flat 14-day baseline 100.00; outside IQR bounds [100.00, 100.00]",
};

describe("explainForecast", () => {
  it("walks from inputs to the projection", () => {
    expect(explainForecast(ramp)).toEqual([
      { kind: "INPUT", text: "History: 30 daily points" },
      { kind: "INPUT", text: "Horizon: 30 days" },
      { kind: "COMPUTE", text: "Fitted line: amount = 1 * day + 81" },
      { kind: "COMPUTE", text: "Daily average = line at horizon midpoint = $125.50" },
      { kind: "COMPUTE", text: "Projected total = $125.50 * 30 = $3765.00" },
      { kind: "RESULT", text: "Trend increasing (+35.8% over the observed history)" },
      { kind: "RESULT", text: "Volatility 9.2%, confidence high" },
    ]);
  });

  it("notes short history and clamping", () => {
    const lines = explainForecast({ ...ramp, history_days: 5, slope: -10, daily_average: 0, projected_total: 0 });
    expect(lines.filter((l) => l.kind === "NOTE").map((l) => l.text)).toEqual([
      "Short history (5 points); treat the trend as indicative",
      "Fitted line falls below zero within the horizon; clamped to 0",
    ]);
  });
});

describe("explainBudget", () => {
  it("explains an overage with its breach date", () => {
    expect(explainBudget(overBudget).map((l) => l.text)).toEqual([
      "Monthly budget $2500.00",
      "Projected spend $2850.00",
      "Over budget by $350.00 (14.0%), severity medium",
      "Budget reached in 27 days (2026-03-28)",
    ]);
  });

  it("explains headroom", () => {
    const lines = explainBudget({
      monthly_budget: 2500,
      projected_spend: 2000,
      overage: -500,
      overage_pct: -20,
      severity: "none",
    });
    expect(lines[2]).toEqual({ kind: "RESULT", text: "Within budget by $500.00 (20.0% under)" });
  });
});

describe("explainAnomalies", () => {
  it("shows the z arithmetic and the flat-baseline note", () => {
    const [e] = explainAnomalies([spike]);
    expect(e.date).toBe("2026-01-08");
    expect(renderLines(e.lines)).toBe(
      [
        "INPUT   Amount $500.00 on 2026-01-08",
        "INPUT   Baseline mean 100, stddev 0",
        "COMPUTE z = (500 - 100) / stddev = 400",
        "COMPUTE IQR bounds [100, 100]",
        "RESULT  high severity via z_score + iqr",
        "NOTE    Baseline was flat; z measured against the stddev floor",
      ].join("\n")
    );
  });

  it("omits the flat-baseline note when only the rounded stddev is 0", () => {
    const [e] = explainAnomalies([{ ...spike, baseline_flat: false }]);
    expect(e.lines.filter((l) => l.kind === "NOTE")).toEqual([]);
  });
});

describe("buildForecastPrompt", () => {
  it("includes only the sections it was given", () => {
    const { prompt } = buildForecastPrompt({ forecast: ramp });
    expect(prompt).not.toContain("BUDGET:");
    expect(prompt).not.toContain("TOP SERVICES:");
    expect(prompt.split("\n")[0]).toBe("FORECAST (30 days):");
  });

  it("lists budget, services and anomalies", () => {
    const { prompt } = buildForecastPrompt({
      forecast: ramp,
      budget: overBudget,
      services: {
        total: 100,
        service_count: 2,
        top_service: "Compute",
        services: [
          { service: "Compute", amount: 75, share_pct: 75 },
          { service: "Storage", amount: 25, share_pct: 25 },
        ],
      },
      anomalies: [spike],
    });
    const lines = prompt.split("\n");
    expect(lines).toContain("- Over budget by $350.00 (14.0%), severity medium");
    expect(lines).toContain("1. Compute: $75.00 (75.0%)");
    expect(lines).toContain("2. Storage: $25.00 (25.0%)");
    expect(lines).toContain(`- 2026-01-08: $500.00 (high; ${spike.reason})`);
  });
});
