import type {
  CostSnapshot,
  CostSnapshotInput,
  Recommendation,
  RecommendationCandidate,
  RecommendationStatus,
  ResolvedStatus,
  RoiSummary,
} from "../../core/src/schema.js";

export type RecommendationFilter = {
  status?: RecommendationStatus;
  account_name?: string;
  limit?: number;
};

export type CostSnapshotFilter = {
  account_name?: string;
  limit?: number;
};

export type LedgerOptions = {
  /** ISO timestamp source for created_at / resolved_at. */
  now?: () => string;
};

/**
 * SavingsLedger contract
 * - Rows are never deleted; ids are assigned once and never reused.
 * - status moves pending -> implemented | rejected, then never again.
 * - Every mutation is one atomic transaction, committed before the promise resolves.
 * - summary() reads one consistent snapshot.
 */
export type SavingsLedger = {
  // -------- recommendations --------
  add(candidate: RecommendationCandidate): Promise<number>; // idempotent on idempotency_key
  addAll(candidates: readonly RecommendationCandidate[]): Promise<number[]>; // all or nothing
  resolve(
    id: number,
    status: ResolvedStatus,
    actual_savings?: number,
    notes?: string
  ): Promise<Recommendation>;

  get(id: number): Promise<Recommendation | null>;
  list(filter?: RecommendationFilter): Promise<Recommendation[]>; // newest first
  quickWins(limit?: number): Promise<Recommendation[]>;

  // -------- ROI --------
  summary(): Promise<RoiSummary>;

  // -------- cost snapshots --------
  recordCostSnapshot(input: CostSnapshotInput): Promise<CostSnapshot>;
  listCostSnapshots(filter?: CostSnapshotFilter): Promise<CostSnapshot[]>; // newest first

  close?(): void;
};
