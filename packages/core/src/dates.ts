import type { ISODate } from "./schema.js";

const MS_PER_DAY = 24 * 60 * 60 * 1000;
const ISO_DATE = /^\d{4}-\d{2}-\d{2}$/;

export function isIsoDate(v: string): boolean {
  if (!ISO_DATE.test(v)) return false;
  const t = Date.parse(`${v}T00:00:00.000Z`);
  // rejects 2026-02-30 style dates that Date.parse rolls over
  return !Number.isNaN(t) && new Date(t).toISOString().slice(0, 10) === v;
}

export function toEpochDay(date: ISODate): number {
  return Math.round(Date.parse(`${date}T00:00:00.000Z`) / MS_PER_DAY);
}

export function fromEpochDay(day: number): ISODate {
  return new Date(day * MS_PER_DAY).toISOString().slice(0, 10);
}

export function addDays(date: ISODate, days: number): ISODate {
  return fromEpochDay(toEpochDay(date) + days);
}

/** Whole days from `a` to `b` (positive when b is later). */
export function daysBetween(a: ISODate, b: ISODate): number {
  return toEpochDay(b) - toEpochDay(a);
}

export function todayUtc(now: () => Date = () => new Date()): ISODate {
  return now().toISOString().slice(0, 10);
}
