import { NotFoundError } from "../../core/src/errors.js";
import type {
  CostSnapshot,
  CostSnapshotInput,
  Recommendation,
  RecommendationCandidate,
  ResolvedStatus,
  RoiSummary,
} from "../../core/src/schema.js";
import {
  CostSnapshotInputSchema,
  ResolveInputSchema,
  parseRecommendationCandidate,
} from "../../core/src/validate.js";
import { selectQuickWins } from "./quick-wins.js";
import { computeRoiSummary } from "./roi.js";
import { transitionRecommendation } from "./state-machine.js";
import type {
  CostSnapshotFilter,
  LedgerOptions,
  RecommendationFilter,
  SavingsLedger,
} from "./store.js";

function clone<T>(x: T): T {
  return structuredClone(x);
}

function newestFirst<T extends { id: number }>(key: (x: T) => string) {
  return (a: T, b: T) => key(b).localeCompare(key(a)) || b.id - a.id;
}

/** Same contract as the sqlite ledger; process lifetime only. */
export class InMemorySavingsLedger implements SavingsLedger {
  private recs = new Map<number, Recommendation>();
  private byKey = new Map<string, number>();
  private snapshots: CostSnapshot[] = [];
  private nextId = 1;
  private nextSnapshotId = 1;
  private now: () => string;

  constructor(opts: LedgerOptions = {}) {
    this.now = opts.now ?? (() => new Date().toISOString());
  }

  private prepare(candidate: RecommendationCandidate, id: number): Recommendation {
    const c = parseRecommendationCandidate(candidate);
    const rec: Recommendation = {
      id,
      title: c.title,
      type: c.type,
      estimated_monthly_savings: c.estimated_monthly_savings,
      risk_level: c.risk_level,
      effort: c.effort,
      status: "pending",
      created_at: this.now(),
      account_name: c.account_name,
    };
    if (c.description !== undefined) rec.description = c.description;
    if (c.idempotency_key !== undefined) rec.idempotency_key = c.idempotency_key;
    return rec;
  }

  async add(candidate: RecommendationCandidate): Promise<number> {
    const [id] = await this.addAll([candidate]);
    return id;
  }

  async addAll(candidates: readonly RecommendationCandidate[]): Promise<number[]> {
    // validate everything before touching state: all or nothing
    const staged: Recommendation[] = [];
    const ids: number[] = [];
    const stagedKeys = new Map<string, number>();
    let next = this.nextId;

    for (const candidate of candidates) {
      const key = candidate.idempotency_key;
      const known = key !== undefined ? this.byKey.get(key) ?? stagedKeys.get(key) : undefined;
      if (known !== undefined) {
        parseRecommendationCandidate(candidate);
        ids.push(known);
        continue;
      }

      const rec = this.prepare(candidate, next++);
      if (rec.idempotency_key !== undefined) stagedKeys.set(rec.idempotency_key, rec.id);
      staged.push(rec);
      ids.push(rec.id);
    }

    for (const rec of staged) {
      this.recs.set(rec.id, rec);
      if (rec.idempotency_key !== undefined) this.byKey.set(rec.idempotency_key, rec.id);
    }
    this.nextId = next;
    return ids;
  }

  async resolve(
    id: number,
    status: ResolvedStatus,
    actual_savings?: number,
    notes?: string
  ): Promise<Recommendation> {
    const input = ResolveInputSchema.parse({ id, status, actual_savings, notes });
    const current = this.recs.get(input.id);
    if (!current) throw new NotFoundError(input.id);

    const next = transitionRecommendation(current, {
      status: input.status,
      actual_savings: input.actual_savings,
      notes: input.notes,
      at: this.now(),
    });
    this.recs.set(next.id, next);
    return clone(next);
  }

  async get(id: number): Promise<Recommendation | null> {
    const r = this.recs.get(id);
    return r ? clone(r) : null;
  }

  async list(filter: RecommendationFilter = {}): Promise<Recommendation[]> {
    const out = [...this.recs.values()]
      .filter((r) => !filter.status || r.status === filter.status)
      .filter((r) => !filter.account_name || r.account_name === filter.account_name)
      .sort(newestFirst((r: Recommendation) => r.created_at));
    return (typeof filter.limit === "number" ? out.slice(0, filter.limit) : out).map(clone);
  }

  async quickWins(limit = 10): Promise<Recommendation[]> {
    return selectQuickWins([...this.recs.values()], limit).map(clone);
  }

  async summary(): Promise<RoiSummary> {
    return computeRoiSummary([...this.recs.values()]);
  }

  async recordCostSnapshot(input: CostSnapshotInput): Promise<CostSnapshot> {
    const s = CostSnapshotInputSchema.parse(input);
    const snap: CostSnapshot = {
      id: this.nextSnapshotId++,
      snapshot_date: s.snapshot_date ?? this.now().slice(0, 10),
      account_name: s.account_name,
      total_cost: s.total_cost,
      period_days: s.period_days,
    };
    if (s.service_breakdown) snap.service_breakdown = s.service_breakdown;
    this.snapshots.push(snap);
    return clone(snap);
  }

  async listCostSnapshots(filter: CostSnapshotFilter = {}): Promise<CostSnapshot[]> {
    const account = filter.account_name ?? "default";
    return this.snapshots
      .filter((s) => s.account_name === account)
      .sort(newestFirst((s: CostSnapshot) => s.snapshot_date))
      .slice(0, filter.limit ?? 30)
      .map(clone);
  }
}
