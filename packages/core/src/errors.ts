import type { RecommendationStatus } from "./schema.js";

export type SpendErrorCode =
  | "INSUFFICIENT_DATA"
  | "INVALID_TRANSITION"
  | "NOT_FOUND"
  | "EXTERNAL_PROVIDER"
  | "INVALID_SERIES";

export class SpendError extends Error {
  constructor(
    public readonly code: SpendErrorCode,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(`${code}: ${message}`, options);
    this.name = "SpendError";
  }
}

/**
 * History too short for the requested computation.
 * Recoverable by supplying more history.
 */
export class InsufficientDataError extends SpendError {
  constructor(
    public readonly required: number,
    public readonly actual: number,
    what = "computation"
  ) {
    super("INSUFFICIENT_DATA", `${what} needs at least ${required} points, got ${actual}`);
    this.name = "InsufficientDataError";
  }
}

export class InvalidTransitionError extends SpendError {
  constructor(
    public readonly id: number,
    public readonly from: RecommendationStatus,
    public readonly to: RecommendationStatus,
    detail?: string
  ) {
    super(
      "INVALID_TRANSITION",
      `recommendation ${id} cannot move from "${from}" to "${to}"${detail ? ` (${detail})` : ""}`
    );
    this.name = "InvalidTransitionError";
  }
}

export class NotFoundError extends SpendError {
  constructor(public readonly id: number | string, what = "recommendation") {
    super("NOT_FOUND", `${what} ${id} not found`);
    this.name = "NotFoundError";
  }
}

/** Advisory narrative or upstream fetch failed. Never fatal to the numbers. */
export class ExternalProviderError extends SpendError {
  constructor(public readonly provider: string, message: string, options?: { cause?: unknown }) {
    super("EXTERNAL_PROVIDER", `${provider}: ${message}`, options);
    this.name = "ExternalProviderError";
  }
}

export class InvalidSeriesError extends SpendError {
  constructor(public readonly violations: Array<{ code: string; message: string; path: string }>) {
    super(
      "INVALID_SERIES",
      violations.map((v) => `${v.path} ${v.message}`).join("; ") || "series is invalid"
    );
    this.name = "InvalidSeriesError";
  }
}

export function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}
