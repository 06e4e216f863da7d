import fs from "node:fs";
import path from "node:path";

import { createDemoCostProvider, runAnalysis } from "../packages/analysis/src/index.js";
import { analysisConfigFromEnv, consoleLogger } from "../packages/core/src/index.js";
import {
  explainAnomalies,
  explainBudget,
  explainForecast,
  renderLines,
} from "../packages/explain/src/index.js";
import { SqliteSavingsLedger } from "../packages/ledger/src/index.js";

// SPEND_MONTHLY_BUDGET=9000 npx tsx examples/run-analysis-demo.ts [account]
async function main() {
  const logger = consoleLogger("demo");
  const { analysis, ledger_path } = analysisConfigFromEnv(process.env);
  const account_name = process.argv[2] ?? "prod";

  fs.mkdirSync(path.dirname(ledger_path), { recursive: true });
  const ledger = new SqliteSavingsLedger(ledger_path);

  try {
    const provider = createDemoCostProvider();

    // idempotency keys make reruns a no-op
    const ids = await ledger.addAll(provider.recommendations());
    logger.info(`seeded recommendations: ${ids.join(", ")}`);

    const report = await runAnalysis({
      provider,
      ledger,
      account_name,
      config: { ...analysis, monthly_budget: analysis.monthly_budget ?? 9000 },
      logger,
    });

    if (report.series.length > 0) {
      const total = report.series.reduce((s, p) => s + p.amount, 0);
      await ledger.recordCostSnapshot({
        snapshot_date: report.meta.as_of,
        account_name,
        total_cost: Math.round(total * 100) / 100,
        period_days: report.series.length,
        service_breakdown: Object.fromEntries(
          (report.services?.services ?? []).map((s) => [s.service, s.amount])
        ),
      });
    }

    const out: string[] = [];
    if (report.forecast) {
      out.push("== Forecast ==", renderLines(explainForecast(report.forecast)));
    }
    if (report.budget) {
      out.push("", "== Budget ==", renderLines(explainBudget(report.budget)));
    }
    for (const a of explainAnomalies(report.anomalies)) {
      out.push("", `== Anomaly ${a.date} ==`, renderLines(a.lines));
    }
    if (report.roi) {
      out.push(
        "",
        "== Savings ==",
        `${report.roi.implemented}/${report.roi.total} implemented, ` +
          `$${report.roi.actual_savings_total.toFixed(2)}/month realized`
      );
    }
    for (const d of report.degraded) out.push(`degraded: ${d}`);

    console.log(out.join("\n"));
  } finally {
    ledger.close();
  }
}

main().catch((e) => {
  console.error(e);
  process.exit(1);
});
