import { analysisConfigFromEnv } from "../packages/core/src/config.js";
import { consoleLogger } from "../packages/core/src/log.js";
import { SqliteSavingsLedger } from "../packages/ledger/src/sqlite-ledger.js";

function argValue(flag: string): string | undefined {
  const i = process.argv.indexOf(flag);
  return i >= 0 ? process.argv[i + 1] : undefined;
}

async function main() {
  const logger = consoleLogger("ledger-report");
  const env = analysisConfigFromEnv(process.env);
  const dbPath = argValue("--db") ?? env.ledger_path;
  const account_name = argValue("--account");

  const ledger = new SqliteSavingsLedger(dbPath);
  try {
    logger.info(`schema v${ledger.schemaVersion()} at ${dbPath}`);

    const report = {
      summary: await ledger.summary(),
      quick_wins: await ledger.quickWins(env.analysis.quick_win_limit),
      pending: await ledger.list({ status: "pending", account_name }),
      snapshots: account_name ? await ledger.listCostSnapshots({ account_name, limit: 12 }) : [],
    };

    // stdout is the report; logs go to stderr
    console.log(JSON.stringify(report, null, 2));
  } finally {
    ledger.close();
  }
}

main().catch((e) => {
  console.error(e);
  process.exit(1);
});
