import { InvalidSeriesError } from "./errors.js";
import type { DailyCostPoint, ISODate } from "./schema.js";

export type SeriesViolationCode = "DUPLICATE_DATE" | "OUT_OF_ORDER" | "FUTURE_DATE";

export type SeriesViolation = {
  code: SeriesViolationCode;
  message: string;
  path: string; // JSON pointer-like path for debugging
};

/**
 * Dates must be unique, ascending and not after `as_of`.
 * Gaps are allowed: a missing day is missing data, not zero spend.
 */
export function checkSeriesInvariants(
  series: readonly DailyCostPoint[],
  as_of?: ISODate
): SeriesViolation[] {
  const v: SeriesViolation[] = [];
  const seen = new Set<string>();

  series.forEach((p, i) => {
    if (seen.has(p.date)) {
      v.push({
        code: "DUPLICATE_DATE",
        message: `Date '${p.date}' appears more than once`,
        path: `/${i}/date`,
      });
    }
    seen.add(p.date);

    const prev = i > 0 ? series[i - 1] : undefined;
    if (prev && prev.date > p.date) {
      v.push({
        code: "OUT_OF_ORDER",
        message: `Date '${p.date}' comes after '${prev.date}'`,
        path: `/${i}/date`,
      });
    }

    if (as_of && p.date > as_of) {
      v.push({
        code: "FUTURE_DATE",
        message: `Date '${p.date}' is after as-of date '${as_of}'`,
        path: `/${i}/date`,
      });
    }
  });

  return v;
}

export function assertSeries(series: readonly DailyCostPoint[], as_of?: ISODate): void {
  const v = checkSeriesInvariants(series, as_of);
  if (v.length > 0) throw new InvalidSeriesError(v);
}
