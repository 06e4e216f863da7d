import {
  aggregateServices,
  analysisRange,
  createDemoCostProvider,
  crossAccountCandidates,
  loadDailyCosts,
  loadServiceBreakdown,
  rankServices,
} from "../packages/analysis/src/index.js";
import type { AccountCosts } from "../packages/analysis/src/index.js";
import { round2, todayUtc } from "../packages/core/src/index.js";
import { InMemorySavingsLedger } from "../packages/ledger/src/index.js";

async function main() {
  const provider = createDemoCostProvider();
  const as_of = todayUtc();
  const range = analysisRange(as_of, 7);

  const accounts: AccountCosts[] = [];
  for (const account_name of provider.accounts()) {
    const series = await loadDailyCosts(provider, range, { account_name, as_of });
    const services = await loadServiceBreakdown(provider, range, { account_name });
    accounts.push({
      account_name,
      total_cost: round2(series.reduce((s, p) => s + p.amount, 0)),
      services,
    });
  }

  for (const a of accounts) console.log(`${a.account_name.padEnd(8)} $${a.total_cost.toFixed(2)}`);

  const combined = rankServices(aggregateServices(accounts.map((a) => a.services ?? {})), 5);
  console.log("\nTop services across accounts:");
  for (const s of combined.services) {
    console.log(`  ${s.service.padEnd(20)} $${s.amount.toFixed(2)} (${s.share_pct.toFixed(1)}%)`);
  }

  const ledger = new InMemorySavingsLedger();
  const ids = await ledger.addAll(crossAccountCandidates(accounts));
  console.log(`\n${ids.length} cross-account recommendations:`);
  for (const r of await ledger.list()) console.log(`  #${r.id} [${r.type}] ${r.title}`);
}

main().catch((e) => {
  console.error(e);
  process.exit(1);
});
