import fs from "node:fs";
import path from "node:path";

import { SqliteSavingsLedger } from "../packages/ledger/src/sqlite-ledger.js";

function assert(cond: unknown, msg: string): asserts cond {
  if (!cond) throw new Error(msg);
}

function makeDeterministicNow(startIso = "2026-01-01T00:00:00.000Z") {
  let t = Date.parse(startIso);
  return () => {
    const iso = new Date(t).toISOString();
    t += 1;
    return iso;
  };
}

async function main() {
  const dbFile = path.join(process.cwd(), "tmp-ledger-durability.sqlite");
  for (const suffix of ["", "-wal", "-shm"]) fs.rmSync(dbFile + suffix, { force: true });

  const now = makeDeterministicNow();
  let id: number;

  // ---- Phase 1: add + resolve, then close ----
  {
    const ledger = new SqliteSavingsLedger(dbFile, { now });
    id = await ledger.add({
      title: "Move nightly batch to spot capacity",
      type: "compute_purchasing",
      estimated_monthly_savings: 300,
      risk_level: "medium",
      effort: "medium",
      idempotency_key: "durability-1",
    });
    await ledger.resolve(id, "implemented", 270, "two weeks of spot usage");
    ledger.close();
  }

  // ---- Phase 2: reopen and check nothing moved ----
  {
    const ledger = new SqliteSavingsLedger(dbFile, { now });
    const rec = await ledger.get(id);
    assert(rec?.status === "implemented", "status not durable");
    assert(rec.actual_monthly_savings === 270, "actual savings not durable");

    const again = await ledger.add({
      title: "duplicate submission",
      type: "compute_purchasing",
      estimated_monthly_savings: 300,
      idempotency_key: "durability-1",
    });
    assert(again === id, "idempotency key not honoured after reopen");

    const summary = await ledger.summary();
    assert(summary.forecast_accuracy_pct === 90, `accuracy ${summary.forecast_accuracy_pct}`);
    console.log(JSON.stringify(summary, null, 2));
    ledger.close();
  }

  console.log("✅ ledger durability ok");
}

main().catch((e) => {
  console.error("❌", e);
  process.exit(1);
});
