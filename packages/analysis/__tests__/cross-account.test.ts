import { describe, expect, it } from "vitest";

import { crossAccountCandidates } from "../src/cross-account.js";

describe("crossAccountCandidates", () => {
  it("flags a lopsided split and services every account runs", () => {
    const out = crossAccountCandidates([
      { account_name: "prod", total_cost: 1000, services: { Compute: 700, Storage: 200, Logs: 100 } },
      { account_name: "staging", total_cost: 300, services: { Compute: 200, Storage: 100 } },
      { account_name: "dev", total_cost: 200, services: { Compute: 150, Queue: 50 } },
    ]);

    expect(out.map((c) => c.title)).toEqual(["prod costs 5.0x more than dev", "Compute used in all accounts"]);
    expect(out[0]).toMatchObject({
      type: "cost_imbalance",
      account_name: "prod",
      estimated_monthly_savings: 0,
      idempotency_key: "cross:cost_imbalance:prod:dev",
    });
    expect(out[1]).toMatchObject({ type: "shared_service_opportunity", risk_level: "low" });
  });

  it("stays quiet for balanced accounts with nothing in common", () => {
    expect(
      crossAccountCandidates([
        { account_name: "a", total_cost: 100, services: { X: 100 } },
        { account_name: "b", total_cost: 90, services: { Y: 90 } },
      ])
    ).toEqual([]);
  });

  it("needs at least two accounts", () => {
    expect(crossAccountCandidates([{ account_name: "solo", total_cost: 5, services: { X: 5 } }])).toEqual([]);
  });

  it("skips the shared-service check when an account has no breakdown", () => {
    const out = crossAccountCandidates([
      { account_name: "a", total_cost: 100, services: { X: 100 } },
      { account_name: "b", total_cost: 100 },
    ]);
    expect(out).toEqual([]);
  });

  it("ignores a zero-cost account for the ratio", () => {
    const out = crossAccountCandidates([
      { account_name: "a", total_cost: 100 },
      { account_name: "b", total_cost: 0 },
    ]);
    expect(out).toEqual([]);
  });
});
