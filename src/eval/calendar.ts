import { Temporal } from "@js-temporal/polyfill";

export const EPOCH_DATE = Temporal.PlainDate.from({ year: 1970, month: 1, day: 1 });
/** 1970-01-05 is the first Monday after the epoch. */
export const EPOCH_MONDAY = Temporal.PlainDate.from({ year: 1970, month: 1, day: 5 });

export function euclidMod(a: number, n: number): number {
  return ((a % n) + n) % n;
}

export function daysInMonth(year: number, month: number): number {
  return Temporal.PlainYearMonth.from({ year, month }).daysInMonth;
}

export function daysBetween(a: Temporal.PlainDate, b: Temporal.PlainDate): number {
  return a.until(b, { largestUnit: "days" }).days;
}

/** Whole months from a's month to b's month, ignoring the day. */
export function monthsBetween(a: { year: number; month: number }, b: { year: number; month: number }): number {
  return b.year * 12 + b.month - (a.year * 12 + a.month);
}

/** Parses YYYY-MM-DD. Dates that would roll over (2026-02-30) give null instead of being constrained. */
export function parseIsoDate(text: string): Temporal.PlainDate | null {
  const m = /^(\d{4})-(\d{2})-(\d{2})$/.exec(text);
  if (!m) return null;
  const year = Number(m[1]);
  const month = Number(m[2]);
  const day = Number(m[3]);
  if (month < 1 || month > 12 || day < 1 || day > daysInMonth(year, month)) return null;
  return Temporal.PlainDate.from({ year, month, day });
}
