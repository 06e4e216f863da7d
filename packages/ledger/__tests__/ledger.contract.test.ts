import { describe, expect, it } from "vitest";
import { ZodError } from "zod";

import { InvalidTransitionError, NotFoundError } from "../../core/src/errors.js";
import { InMemorySavingsLedger } from "../src/in-memory-ledger.js";
import { SqliteSavingsLedger } from "../src/sqlite-ledger.js";
import type { SavingsLedger } from "../src/store.js";
import { candidate, tickingClock } from "./_helpers/ledger.js";

const implementations: Array<[string, () => SavingsLedger]> = [
  ["sqlite", () => new SqliteSavingsLedger(":memory:", { now: tickingClock() })],
  ["memory", () => new InMemorySavingsLedger({ now: tickingClock() })],
];

describe.each(implementations)("%s ledger", (_name, createLedger) => {
  it("round-trips a recommendation unchanged", async () => {
    const ledger = createLedger();
    const id = await ledger.add(
      candidate({ account_name: "prod", description: "CPU under 10% for a month", idempotency_key: "k-1" })
    );

    expect(id).toBe(1);
    expect(await ledger.get(id)).toEqual({
      id: 1,
      title: "Rightsize idle build agents",
      type: "compute_rightsizing",
      estimated_monthly_savings: 100,
      risk_level: "low",
      effort: "quick_win",
      status: "pending",
      created_at: "2026-02-01T09:00:00.000Z",
      account_name: "prod",
      description: "CPU under 10% for a month",
      idempotency_key: "k-1",
    });
    ledger.close?.();
  });

  it("assigns increasing ids", async () => {
    const ledger = createLedger();
    const a = await ledger.add(candidate());
    const b = await ledger.add(candidate({ title: "Second" }));
    expect(b).toBeGreaterThan(a);
    ledger.close?.();
  });

  it("reflects a resolution in the summary and refuses a second one", async () => {
    const ledger = createLedger();
    const id = await ledger.add(candidate());

    const resolved = await ledger.resolve(id, "implemented", 97, "resized on Tuesday");
    expect(resolved.status).toBe("implemented");
    expect(resolved.actual_monthly_savings).toBe(97);
    expect(resolved.resolved_at).toBe("2026-02-01T09:00:01.000Z");
    expect(await ledger.get(id)).toEqual(resolved);

    const s = await ledger.summary();
    expect(s.implemented).toBe(1);
    expect(s.pending).toBe(0);
    expect(s.actual_savings_total).toBe(97);
    expect(s.annual_projection).toBe(1164);
    expect(s.forecast_accuracy_pct).toBe(97);

    await expect(ledger.resolve(id, "rejected")).rejects.toBeInstanceOf(InvalidTransitionError);
    expect(await ledger.get(id)).toEqual(resolved);
    ledger.close?.();
  });

  it("requires actual savings to mark a recommendation implemented", async () => {
    const ledger = createLedger();
    const id = await ledger.add(candidate());
    await expect(ledger.resolve(id, "implemented")).rejects.toThrow(
      'INVALID_TRANSITION: recommendation 1 cannot move from "pending" to "implemented" (implemented requires actual_monthly_savings)'
    );
    expect((await ledger.get(id))?.status).toBe("pending");
    ledger.close?.();
  });

  it("lets a rejection omit actual savings", async () => {
    const ledger = createLedger();
    const id = await ledger.add(candidate());
    const r = await ledger.resolve(id, "rejected", undefined, "owner declined");
    expect(r.status).toBe("rejected");
    expect(r.actual_monthly_savings).toBeUndefined();
    expect(r.notes).toBe("owner declined");
    expect((await ledger.summary()).rejected).toBe(1);
    ledger.close?.();
  });

  it("reports unknown ids", async () => {
    const ledger = createLedger();
    await expect(ledger.resolve(42, "rejected")).rejects.toBeInstanceOf(NotFoundError);
    expect(await ledger.get(42)).toBeNull();
    for (const id of [0, -3, 1.5]) {
      await expect(ledger.resolve(id, "rejected")).rejects.toBeInstanceOf(NotFoundError);
    }
    ledger.close?.();
  });

  it("lets only one of two racing resolutions win", async () => {
    const ledger = createLedger();
    const id = await ledger.add(candidate());
    const results = await Promise.allSettled([
      ledger.resolve(id, "implemented", 90),
      ledger.resolve(id, "rejected"),
    ]);
    expect(results.map((r) => r.status).sort()).toEqual(["fulfilled", "rejected"]);
    const s = await ledger.summary();
    expect(s.implemented + s.rejected).toBe(1);
    ledger.close?.();
  });

  it("returns the existing id for a repeated idempotency key", async () => {
    const ledger = createLedger();
    const a = await ledger.add(candidate({ idempotency_key: "scan:vol-1" }));
    const b = await ledger.add(candidate({ idempotency_key: "scan:vol-1", title: "changed" }));
    expect(b).toBe(a);
    expect((await ledger.summary()).total).toBe(1);
    expect((await ledger.get(a))?.title).toBe("Rightsize idle build agents");
    ledger.close?.();
  });

  it("adds a batch all or nothing", async () => {
    const ledger = createLedger();
    await expect(
      ledger.addAll([candidate(), candidate({ estimated_monthly_savings: -1 })])
    ).rejects.toBeInstanceOf(ZodError);
    expect((await ledger.summary()).total).toBe(0);

    const ids = await ledger.addAll([
      candidate({ idempotency_key: "a" }),
      candidate({ idempotency_key: "a" }),
      candidate({ idempotency_key: "b" }),
    ]);
    expect(ids[0]).toBe(ids[1]);
    expect(ids[2]).not.toBe(ids[0]);
    expect((await ledger.summary()).total).toBe(2);
    ledger.close?.();
  });

  it("lists newest first with filters", async () => {
    const ledger = createLedger();
    const a = await ledger.add(candidate({ account_name: "prod" }));
    const b = await ledger.add(candidate({ account_name: "dev" }));
    const c = await ledger.add(candidate({ account_name: "prod" }));
    await ledger.resolve(a, "rejected");

    expect((await ledger.list()).map((r) => r.id)).toEqual([c, b, a]);
    expect((await ledger.list({ account_name: "prod" })).map((r) => r.id)).toEqual([c, a]);
    expect((await ledger.list({ status: "pending" })).map((r) => r.id)).toEqual([c, b]);
    expect((await ledger.list({ limit: 1 })).map((r) => r.id)).toEqual([c]);
    ledger.close?.();
  });

  it("selects pending low-risk quick wins by savings", async () => {
    const ledger = createLedger();
    const small = await ledger.add(candidate({ estimated_monthly_savings: 20 }));
    const big = await ledger.add(candidate({ estimated_monthly_savings: 300 }));
    await ledger.add(candidate({ estimated_monthly_savings: 500, risk_level: "medium" }));
    await ledger.add(candidate({ estimated_monthly_savings: 500, effort: "large" }));
    const done = await ledger.add(candidate({ estimated_monthly_savings: 900 }));
    await ledger.resolve(done, "implemented", 850);

    expect((await ledger.quickWins()).map((r) => r.id)).toEqual([big, small]);
    expect((await ledger.quickWins(1)).map((r) => r.id)).toEqual([big]);
    ledger.close?.();
  });

  it("keeps cost snapshots per account, newest first", async () => {
    const ledger = createLedger();
    await ledger.recordCostSnapshot({ snapshot_date: "2026-01-01", total_cost: 900, period_days: 7 });
    await ledger.recordCostSnapshot({
      snapshot_date: "2026-01-08",
      total_cost: 850.5,
      period_days: 7,
      service_breakdown: { Compute: 600, Storage: 250.5 },
    });
    await ledger.recordCostSnapshot({ account_name: "dev", total_cost: 40, period_days: 7 });

    const prod = await ledger.listCostSnapshots();
    expect(prod.map((s) => s.snapshot_date)).toEqual(["2026-01-08", "2026-01-01"]);
    expect(prod[0].service_breakdown).toEqual({ Compute: 600, Storage: 250.5 });
    expect(prod[1].service_breakdown).toBeUndefined();

    const dev = await ledger.listCostSnapshots({ account_name: "dev" });
    expect(dev).toHaveLength(1);
    expect(dev[0].snapshot_date).toBe("2026-02-01");
    ledger.close?.();
  });
});
