import { InvalidTransitionError } from "../../core/src/errors.js";
import type { Recommendation, ResolvedStatus } from "../../core/src/schema.js";

export type ResolveInput = {
  status: ResolvedStatus;
  actual_savings?: number;
  notes?: string;
  at: string;
};

/**
 * pending -> implemented | rejected. Both targets are terminal.
 * Returns the resolved copy; never mutates `current`.
 */
export function transitionRecommendation(current: Recommendation, input: ResolveInput): Recommendation {
  if (current.status !== "pending") {
    throw new InvalidTransitionError(current.id, current.status, input.status, "already resolved");
  }

  if (input.status === "implemented" && input.actual_savings === undefined) {
    throw new InvalidTransitionError(
      current.id,
      current.status,
      input.status,
      "implemented requires actual_monthly_savings"
    );
  }

  const next: Recommendation = { ...current, status: input.status, resolved_at: input.at };
  if (input.actual_savings !== undefined) next.actual_monthly_savings = input.actual_savings;
  if (input.notes !== undefined) next.notes = input.notes;
  return next;
}

export function isResolved(r: Pick<Recommendation, "status">): boolean {
  return r.status !== "pending";
}
