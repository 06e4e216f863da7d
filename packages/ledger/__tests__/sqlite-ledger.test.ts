import Database from "better-sqlite3";
import { afterEach, describe, expect, it } from "vitest";

import { InvalidTransitionError } from "../../core/src/errors.js";
import { MIGRATIONS, SqliteSavingsLedger } from "../src/sqlite-ledger.js";
import { candidate, tempDbPath, tickingClock } from "./_helpers/ledger.js";

const cleanups: Array<() => void> = [];

function tempFile(): string {
  const t = tempDbPath();
  cleanups.push(t.cleanup);
  return t.path;
}

afterEach(() => {
  while (cleanups.length > 0) cleanups.pop()?.();
});

describe("SqliteSavingsLedger", () => {
  it("keeps committed state across reopen", async () => {
    const path = tempFile();

    const first = new SqliteSavingsLedger(path, { now: tickingClock() });
    const id = await first.add(candidate({ estimated_monthly_savings: 250 }));
    await first.resolve(id, "implemented", 200);
    await first.recordCostSnapshot({ snapshot_date: "2026-01-31", total_cost: 4200, period_days: 30 });
    const before = await first.get(id);
    first.close();

    const reopened = new SqliteSavingsLedger(path);
    expect(await reopened.get(id)).toEqual(before);
    const s = await reopened.summary();
    expect(s.total).toBe(1);
    expect(s.actual_savings_total).toBe(200);
    expect(s.forecast_accuracy_pct).toBe(80);
    expect((await reopened.listCostSnapshots()).map((x) => x.total_cost)).toEqual([4200]);
    reopened.close();
  });

  it("never reuses ids across reopen", async () => {
    const path = tempFile();
    const a = new SqliteSavingsLedger(path);
    const first = await a.add(candidate());
    a.close();

    const b = new SqliteSavingsLedger(path);
    const second = await b.add(candidate());
    expect(second).toBe(first + 1);
    b.close();
  });

  it("serializes resolutions across connections", async () => {
    const path = tempFile();
    const a = new SqliteSavingsLedger(path);
    const b = new SqliteSavingsLedger(path);

    const id = await a.add(candidate());
    await b.resolve(id, "rejected");
    await expect(a.resolve(id, "implemented", 50)).rejects.toBeInstanceOf(InvalidTransitionError);
    expect((await a.get(id))?.status).toBe("rejected");

    a.close();
    b.close();
  });

  it("refuses deletes and edits of resolved rows at the storage layer", async () => {
    const path = tempFile();
    const ledger = new SqliteSavingsLedger(path);
    const id = await ledger.add(candidate());
    await ledger.resolve(id, "rejected");
    ledger.close();

    const raw = new Database(path);
    expect(() => raw.prepare("DELETE FROM recommendations WHERE id = ?").run(id)).toThrow(
      /never deleted/
    );
    expect(() =>
      raw.prepare("UPDATE recommendations SET status = 'pending', resolved_at = NULL WHERE id = ?").run(id)
    ).toThrow(/immutable/);
    raw.close();
  });

  it("rejects a resolved status without a resolution time", () => {
    const raw = new Database(":memory:");
    raw.exec(MIGRATIONS.join("\n"));
    raw
      .prepare(
        `INSERT INTO recommendations(created_at, type, title, estimated_monthly_savings, risk_level, effort)
         VALUES ('2026-01-01T00:00:00.000Z', 't', 'x', 1, 'low', 'medium')`
      )
      .run();
    expect(() => raw.prepare("UPDATE recommendations SET status = 'implemented' WHERE id = 1").run()).toThrow(
      /CHECK constraint failed/
    );
    raw.close();
  });

  it("migrates a first-version database in place", async () => {
    const path = tempFile();
    const raw = new Database(path);
    raw.exec(MIGRATIONS[0]);
    raw.pragma("user_version = 1");
    raw
      .prepare(
        `INSERT INTO recommendations(created_at, account_name, type, title, estimated_monthly_savings, risk_level, effort)
         VALUES ('2026-01-05T10:00:00.000Z', 'prod', 'storage_lifecycle', 'Tier cold objects', 120, 'low', 'quick_win')`
      )
      .run();
    raw.close();

    const ledger = new SqliteSavingsLedger(path, { now: tickingClock() });
    expect(ledger.schemaVersion()).toBe(MIGRATIONS.length);
    expect(await ledger.get(1)).toEqual({
      id: 1,
      title: "Tier cold objects",
      type: "storage_lifecycle",
      estimated_monthly_savings: 120,
      risk_level: "low",
      effort: "quick_win",
      status: "pending",
      created_at: "2026-01-05T10:00:00.000Z",
      account_name: "prod",
    });

    const id = await ledger.add(candidate({ idempotency_key: "after-migration" }));
    expect(id).toBe(2);
    expect(await ledger.add(candidate({ idempotency_key: "after-migration" }))).toBe(2);
    ledger.close();
  });

  it("is a no-op to migrate an up-to-date database", () => {
    const path = tempFile();
    new SqliteSavingsLedger(path).close();
    const again = new SqliteSavingsLedger(path);
    expect(again.schemaVersion()).toBe(MIGRATIONS.length);
    again.close();
  });
});
