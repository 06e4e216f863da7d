// packages/ledger/__tests__/_helpers/ledger.ts
import { mkdtempSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";

import type { RecommendationCandidate } from "../../../core/src/schema.js";

/** Each call returns a later timestamp, one second apart. */
export function tickingClock(start = "2026-02-01T09:00:00.000Z"): () => string {
  let t = Date.parse(start);
  return () => {
    const out = new Date(t).toISOString();
    t += 1000;
    return out;
  };
}

export function tempDbPath(): { path: string; cleanup: () => void } {
  const dir = mkdtempSync(join(tmpdir(), "savings-ledger-"));
  return {
    path: join(dir, "ledger.sqlite"),
    cleanup: () => rmSync(dir, { recursive: true, force: true }),
  };
}

export function candidate(overrides: Partial<RecommendationCandidate> = {}): RecommendationCandidate {
  return {
    title: "Rightsize idle build agents",
    type: "compute_rightsizing",
    estimated_monthly_savings: 100,
    risk_level: "low",
    effort: "quick_win",
    ...overrides,
  };
}
