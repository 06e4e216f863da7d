// packages/ledger/src/sqlite-ledger.ts
import Database from "better-sqlite3";

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
  ServiceBreakdownSchema,
  parseRecommendationCandidate,
} from "../../core/src/validate.js";
import { computeRoiSummary } from "./roi.js";
import { transitionRecommendation } from "./state-machine.js";
import type {
  CostSnapshotFilter,
  LedgerOptions,
  RecommendationFilter,
  SavingsLedger,
} from "./store.js";

type RecommendationRow = {
  id: number;
  created_at: string;
  account_name: string;
  type: string;
  title: string;
  description: string | null;
  estimated_monthly_savings: number;
  risk_level: Recommendation["risk_level"];
  effort: Recommendation["effort"];
  status: Recommendation["status"];
  resolved_at: string | null;
  actual_monthly_savings: number | null;
  notes: string | null;
  idempotency_key: string | null;
};

type SnapshotRow = {
  id: number;
  snapshot_date: string;
  account_name: string;
  total_cost: number;
  period_days: number;
  service_breakdown_json: string | null;
};

/**
 * Ordered schema steps. Index + 1 is the user_version after applying it.
 * Append only: never edit a step that has shipped.
 */
export const MIGRATIONS: readonly string[] = [
  // v1
  `
  CREATE TABLE IF NOT EXISTS recommendations (
    id                        INTEGER PRIMARY KEY AUTOINCREMENT,
    created_at                TEXT NOT NULL,
    account_name              TEXT NOT NULL DEFAULT 'default',
    type                      TEXT NOT NULL,
    title                     TEXT NOT NULL,
    description               TEXT,
    estimated_monthly_savings REAL NOT NULL CHECK (estimated_monthly_savings >= 0),
    risk_level                TEXT NOT NULL CHECK (risk_level IN ('low', 'medium', 'high')),
    effort                    TEXT NOT NULL CHECK (effort IN ('quick_win', 'medium', 'large')),
    status                    TEXT NOT NULL DEFAULT 'pending'
                              CHECK (status IN ('pending', 'implemented', 'rejected')),
    resolved_at               TEXT,
    actual_monthly_savings    REAL,
    notes                     TEXT,
    CHECK ((status = 'pending') = (resolved_at IS NULL))
  );

  CREATE INDEX IF NOT EXISTS idx_recommendations_status
    ON recommendations(status, created_at);

  CREATE TABLE IF NOT EXISTS cost_snapshots (
    id                     INTEGER PRIMARY KEY AUTOINCREMENT,
    snapshot_date          TEXT NOT NULL,
    account_name           TEXT NOT NULL DEFAULT 'default',
    total_cost             REAL NOT NULL,
    period_days            INTEGER NOT NULL,
    service_breakdown_json TEXT
  );

  CREATE INDEX IF NOT EXISTS idx_snapshots_account
    ON cost_snapshots(account_name, snapshot_date DESC);
  `,
  // v2: idempotent add + append/update-only guards
  `
  ALTER TABLE recommendations ADD COLUMN idempotency_key TEXT;

  CREATE UNIQUE INDEX IF NOT EXISTS idx_recommendations_idem
    ON recommendations(idempotency_key)
    WHERE idempotency_key IS NOT NULL;

  CREATE TRIGGER IF NOT EXISTS recommendations_no_delete
  BEFORE DELETE ON recommendations
  BEGIN
    SELECT RAISE(ABORT, 'recommendations are never deleted');
  END;

  CREATE TRIGGER IF NOT EXISTS recommendations_resolved_frozen
  BEFORE UPDATE ON recommendations
  WHEN OLD.status <> 'pending' OR NEW.id <> OLD.id
  BEGIN
    SELECT RAISE(ABORT, 'resolved recommendations are immutable');
  END;
  `,
];

function toRecommendation(r: RecommendationRow): Recommendation {
  const out: Recommendation = {
    id: r.id,
    title: r.title,
    type: r.type,
    estimated_monthly_savings: r.estimated_monthly_savings,
    risk_level: r.risk_level,
    effort: r.effort,
    status: r.status,
    created_at: r.created_at,
    account_name: r.account_name,
  };
  if (r.resolved_at !== null) out.resolved_at = r.resolved_at;
  if (r.actual_monthly_savings !== null) out.actual_monthly_savings = r.actual_monthly_savings;
  if (r.notes !== null) out.notes = r.notes;
  if (r.description !== null) out.description = r.description;
  if (r.idempotency_key !== null) out.idempotency_key = r.idempotency_key;
  return out;
}

function toSnapshot(r: SnapshotRow): CostSnapshot {
  const out: CostSnapshot = {
    id: r.id,
    snapshot_date: r.snapshot_date,
    account_name: r.account_name,
    total_cost: r.total_cost,
    period_days: r.period_days,
  };
  if (r.service_breakdown_json !== null) {
    out.service_breakdown = ServiceBreakdownSchema.parse(JSON.parse(r.service_breakdown_json));
  }
  return out;
}

export class SqliteSavingsLedger implements SavingsLedger {
  private db: Database.Database;
  private now: () => string;

  constructor(filename = "savings-ledger.sqlite", opts: LedgerOptions = {}) {
    this.db = new Database(filename);
    this.db.pragma("journal_mode = WAL");
    // a commit must survive a crash right after the promise resolves
    this.db.pragma("synchronous = FULL");
    this.db.pragma("busy_timeout = 5000");
    this.now = opts.now ?? (() => new Date().toISOString());
    this.migrate();
  }

  /**
   * Synchronous BEGIN IMMEDIATE / COMMIT around `fn`.
   * Nested calls join the outer transaction.
   */
  private runInTransaction<T>(fn: () => T): T {
    if (this.db.inTransaction) return fn();

    this.db.exec("BEGIN IMMEDIATE;");
    try {
      const out = fn();
      this.db.exec("COMMIT;");
      return out;
    } catch (e) {
      if (this.db.inTransaction) this.db.exec("ROLLBACK;");
      throw e;
    }
  }

  schemaVersion(): number {
    const v = this.db.pragma("user_version", { simple: true });
    return typeof v === "number" ? v : 0;
  }

  private migrate() {
    this.runInTransaction(() => {
      for (let v = this.schemaVersion(); v < MIGRATIONS.length; v++) {
        this.db.exec(MIGRATIONS[v]);
        this.db.pragma(`user_version = ${v + 1}`);
      }
    });
  }

  // ---------------- recommendations ----------------

  private insert(candidate: RecommendationCandidate): number {
    const c = parseRecommendationCandidate(candidate);

    if (c.idempotency_key !== undefined) {
      const existing = this.db
        .prepare<[string], { id: number }>(
          `SELECT id FROM recommendations WHERE idempotency_key = ? LIMIT 1`
        )
        .get(c.idempotency_key);
      if (existing) return existing.id;
    }

    const info = this.db
      .prepare(
        `
        INSERT INTO recommendations(
          created_at, account_name, type, title, description,
          estimated_monthly_savings, risk_level, effort, status, idempotency_key
        )
        VALUES (?, ?, ?, ?, ?, ?, ?, ?, 'pending', ?)
      `
      )
      .run(
        this.now(),
        c.account_name,
        c.type,
        c.title,
        c.description ?? null,
        c.estimated_monthly_savings,
        c.risk_level,
        c.effort,
        c.idempotency_key ?? null
      );

    return Number(info.lastInsertRowid);
  }

  async add(candidate: RecommendationCandidate): Promise<number> {
    return this.runInTransaction(() => this.insert(candidate));
  }

  async addAll(candidates: readonly RecommendationCandidate[]): Promise<number[]> {
    return this.runInTransaction(() => candidates.map((c) => this.insert(c)));
  }

  private getRow(id: number): Recommendation | null {
    const row = this.db
      .prepare<[number], RecommendationRow>(`SELECT * FROM recommendations WHERE id = ? LIMIT 1`)
      .get(id);
    return row ? toRecommendation(row) : null;
  }

  async get(id: number): Promise<Recommendation | null> {
    return this.getRow(id);
  }

  async resolve(
    id: number,
    status: ResolvedStatus,
    actual_savings?: number,
    notes?: string
  ): Promise<Recommendation> {
    const input = ResolveInputSchema.parse({ id, status, actual_savings, notes });

    return this.runInTransaction(() => {
      const current = this.getRow(input.id);
      if (!current) throw new NotFoundError(input.id);

      const next = transitionRecommendation(current, {
        status: input.status,
        actual_savings: input.actual_savings,
        notes: input.notes,
        at: this.now(),
      });

      this.db
        .prepare(
          `
          UPDATE recommendations
          SET status = ?, resolved_at = ?, actual_monthly_savings = ?, notes = ?
          WHERE id = ? AND status = 'pending'
        `
        )
        .run(
          next.status,
          next.resolved_at ?? null,
          next.actual_monthly_savings ?? null,
          next.notes ?? null,
          next.id
        );

      return next;
    });
  }

  async list(filter: RecommendationFilter = {}): Promise<Recommendation[]> {
    const where: string[] = [];
    const params: Array<string | number> = [];

    if (filter.status) {
      where.push("status = ?");
      params.push(filter.status);
    }
    if (filter.account_name) {
      where.push("account_name = ?");
      params.push(filter.account_name);
    }
    params.push(filter.limit ?? -1); // LIMIT -1 = no limit

    const rows = this.db
      .prepare<Array<string | number>, RecommendationRow>(
        `SELECT * FROM recommendations
         ${where.length > 0 ? `WHERE ${where.join(" AND ")}` : ""}
         ORDER BY created_at DESC, id DESC
         LIMIT ?`
      )
      .all(...params);

    return rows.map(toRecommendation);
  }

  async quickWins(limit = 10): Promise<Recommendation[]> {
    const rows = this.db
      .prepare<[number], RecommendationRow>(
        `SELECT * FROM recommendations
         WHERE status = 'pending' AND risk_level = 'low' AND effort = 'quick_win'
         ORDER BY estimated_monthly_savings DESC, id ASC
         LIMIT ?`
      )
      .all(limit);

    return rows.map(toRecommendation);
  }

  // ---------------- ROI ----------------

  async summary(): Promise<RoiSummary> {
    // one read transaction: counts and totals come from the same snapshot
    return this.runInTransaction(() => {
      const rows = this.db
        .prepare<[], RecommendationRow>(`SELECT * FROM recommendations ORDER BY id`)
        .all();
      return computeRoiSummary(rows.map(toRecommendation));
    });
  }

  // ---------------- cost snapshots ----------------

  async recordCostSnapshot(input: CostSnapshotInput): Promise<CostSnapshot> {
    const s = CostSnapshotInputSchema.parse(input);
    const snapshot_date = s.snapshot_date ?? this.now().slice(0, 10);

    return this.runInTransaction(() => {
      const info = this.db
        .prepare(
          `
          INSERT INTO cost_snapshots(
            snapshot_date, account_name, total_cost, period_days, service_breakdown_json
          )
          VALUES (?, ?, ?, ?, ?)
        `
        )
        .run(
          snapshot_date,
          s.account_name,
          s.total_cost,
          s.period_days,
          s.service_breakdown ? JSON.stringify(s.service_breakdown) : null
        );

      const out: CostSnapshot = {
        id: Number(info.lastInsertRowid),
        snapshot_date,
        account_name: s.account_name,
        total_cost: s.total_cost,
        period_days: s.period_days,
      };
      if (s.service_breakdown) out.service_breakdown = s.service_breakdown;
      return out;
    });
  }

  async listCostSnapshots(filter: CostSnapshotFilter = {}): Promise<CostSnapshot[]> {
    const rows = this.db
      .prepare<[string, number], SnapshotRow>(
        `SELECT * FROM cost_snapshots
         WHERE account_name = ?
         ORDER BY snapshot_date DESC, id DESC
         LIMIT ?`
      )
      .all(filter.account_name ?? "default", filter.limit ?? 30);

    return rows.map(toSnapshot);
  }

  close(): void {
    this.db.close();
  }
}
