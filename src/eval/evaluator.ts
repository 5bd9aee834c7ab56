import { Temporal } from "@js-temporal/polyfill";
import {
  expandDaySpecs,
  monthNumber,
  ordinalPosition,
  timeMinutes,
  weekdayNumber,
  type DateSpec,
  type DayFilter,
  type MonthName,
  type MonthTarget,
  type NearestDirection,
  type OrdinalPosition,
  type ScheduleData,
  type ScheduleExpr,
  type TimeOfDay,
  type Weekday,
  type YearTarget,
} from "../lang/ast.js";
import { EPOCH_DATE, EPOCH_MONDAY, daysBetween, daysInMonth, euclidMod, monthsBetween, parseIsoDate } from "./calendar.js";
import { Zone } from "./zone.js";

type PlainDate = Temporal.PlainDate;
type YearMonth = Temporal.PlainYearMonth;

// Search bounds. Well-formed schedules resolve in a handful of steps; these
// only stop pathological except/during combinations from spinning forever.
const MAX_ITERATIONS = 1000;
const DAY_SCAN = 8;
const LONG_DAY_SCAN = 400;
// The aligned day on or before today, then the one an interval earlier.
const ALIGNED_DAY_SCAN = 2;
const WEEK_SCAN = 54;
const MONTH_SCAN_PER_INTERVAL = 24;
const YEAR_SCAN_PER_INTERVAL = 8;

const SECOND = 1000;
const MINUTE = 60 * SECOND;
const MIDNIGHT: TimeOfDay = { hour: 0, minute: 0 };
const END_OF_DAY: TimeOfDay = { hour: 23, minute: 59 };

const compare = (a: PlainDate, b: PlainDate): number => Temporal.PlainDate.compare(a, b);

interface Context {
  zone: Zone;
  /** Parsed `starting` date, null when alignment uses the epoch. */
  anchor: PlainDate | null;
}

function contextFor(schedule: ScheduleData, zone?: Zone): Context {
  return { zone: zone ?? Zone.resolve(schedule.timezone), anchor: schedule.anchor ? parseIsoDate(schedule.anchor) : null };
}

// --- date helpers ---

function matchesDayFilter(date: PlainDate, filter: DayFilter): boolean {
  const dow = date.dayOfWeek;
  switch (filter.kind) {
    case "every": return true;
    case "weekday": return dow <= 5;
    case "weekend": return dow >= 6;
    case "days": return filter.days.some((d) => weekdayNumber(d) === dow);
  }
}

function yearMonth(year: number, month: number): YearMonth {
  return Temporal.PlainYearMonth.from({ year, month });
}

/** Named dates that do not exist in a year (feb 29) yield null. */
function dateIn(ym: YearMonth, day: number): PlainDate | null {
  return day <= ym.daysInMonth ? ym.toPlainDate({ day }) : null;
}

function lastDayOfMonth(ym: YearMonth): PlainDate {
  return ym.toPlainDate({ day: ym.daysInMonth });
}

function lastWeekdayOfMonth(ym: YearMonth): PlainDate {
  let d = lastDayOfMonth(ym);
  while (d.dayOfWeek >= 6) d = d.subtract({ days: 1 });
  return d;
}

function lastDayNamed(ym: YearMonth, weekday: Weekday): PlainDate {
  const last = lastDayOfMonth(ym);
  return last.subtract({ days: euclidMod(last.dayOfWeek - weekdayNumber(weekday), 7) });
}

function nthDayNamed(ym: YearMonth, weekday: Weekday, n: number): PlainDate | null {
  const first = ym.toPlainDate({ day: 1 });
  return dateIn(ym, 1 + euclidMod(weekdayNumber(weekday) - first.dayOfWeek, 7) + (n - 1) * 7);
}

function ordinalDate(ym: YearMonth, ordinal: OrdinalPosition, weekday: Weekday): PlainDate | null {
  return ordinal === "last" ? lastDayNamed(ym, weekday) : nthDayNamed(ym, weekday, ordinalPosition(ordinal));
}

/**
 * Maps a weekend day-of-month onto a business day. Without a direction the
 * result never leaves the month: Saturday the 1st becomes Monday the 3rd and a
 * Sunday on the last day becomes the preceding Friday.
 */
export function nearestWeekday(year: number, month: number, day: number, direction: NearestDirection | null): PlainDate | null {
  const lastDay = daysInMonth(year, month);
  if (day > lastDay) return null;
  const date = Temporal.PlainDate.from({ year, month, day });
  const dow = date.dayOfWeek;
  if (dow <= 5) return date;
  if (dow === 6) {
    if (direction === "next") return date.add({ days: 2 });
    if (direction === "previous") return date.subtract({ days: 1 });
    return day === 1 ? date.add({ days: 2 }) : date.subtract({ days: 1 });
  }
  if (direction === "next") return date.add({ days: 1 });
  if (direction === "previous") return date.subtract({ days: 2 });
  return day >= lastDay ? date.subtract({ days: 2 }) : date.add({ days: 1 });
}

function monthCandidates(ym: YearMonth, target: MonthTarget): PlainDate[] {
  switch (target.kind) {
    case "days":
      return expandDaySpecs(target.specs)
        .filter((day) => day <= ym.daysInMonth)
        .map((day) => ym.toPlainDate({ day }));
    case "lastDay":
      return [lastDayOfMonth(ym)];
    case "lastWeekday":
      return [lastWeekdayOfMonth(ym)];
    case "nearestWeekday": {
      const d = nearestWeekday(ym.year, ym.month, target.day, target.direction);
      return d ? [d] : [];
    }
    case "ordinalWeekday": {
      const d = ordinalDate(ym, target.ordinal, target.weekday);
      return d ? [d] : [];
    }
  }
}

function yearTargetDate(year: number, target: YearTarget): PlainDate | null {
  const ym = yearMonth(year, monthNumber(target.month));
  switch (target.kind) {
    case "date":
    case "dayOfMonth":
      return dateIn(ym, target.day);
    case "ordinalWeekday":
      return ordinalDate(ym, target.ordinal, target.weekday);
    case "lastWeekday":
      return lastWeekdayOfMonth(ym);
  }
}

function isExcepted(date: PlainDate, except: readonly DateSpec[]): boolean {
  return except.some((exc) => {
    if (exc.kind === "named") return monthNumber(exc.month) === date.month && exc.day === date.day;
    const iso = parseIsoDate(exc.date);
    return iso !== null && iso.equals(date);
  });
}

function inDuring(date: PlainDate, during: readonly MonthName[]): boolean {
  return during.length === 0 || during.some((m) => monthNumber(m) === date.month);
}

function nextDuringMonth(date: PlainDate, during: readonly MonthName[]): PlainDate {
  const months = during.map(monthNumber).sort((a, b) => a - b);
  const later = months.find((m) => m > date.month);
  return later !== undefined
    ? Temporal.PlainDate.from({ year: date.year, month: later, day: 1 })
    : Temporal.PlainDate.from({ year: date.year + 1, month: months[0], day: 1 });
}

function prevDuringMonth(date: PlainDate, during: readonly MonthName[]): PlainDate {
  const allowed = new Set(during.map(monthNumber));
  let ym = date.toPlainYearMonth().subtract({ months: 1 });
  for (let i = 0; i < 13; i++) {
    if (allowed.has(ym.month)) return lastDayOfMonth(ym);
    ym = ym.subtract({ months: 1 });
  }
  return date.subtract({ days: 1 });
}

/** ISO until is literal; a month/day until is its first occurrence on or after today. */
function resolveUntil(until: DateSpec, today: PlainDate): PlainDate {
  if (until.kind === "iso") return parseIsoDate(until.date) ?? today;
  const month = monthNumber(until.month);
  for (let year = today.year; year <= today.year + 1; year++) {
    const d = dateIn(yearMonth(year, month), until.day);
    if (d && compare(d, today) >= 0) return d;
  }
  // feb 29 in a common year is constrained to feb 28.
  return Temporal.PlainDate.from({ year: today.year + 1, month, day: until.day });
}

function earliestAfter(date: PlainDate, times: readonly TimeOfDay[], zone: Zone, now: Date): Date | null {
  let best: Date | null = null;
  for (const t of times) {
    const candidate = zone.atTime(date, t);
    if (candidate > now && (!best || candidate < best)) best = candidate;
  }
  return best;
}

function latestBefore(date: PlainDate, times: readonly TimeOfDay[], zone: Zone, now: Date): Date | null {
  let best: Date | null = null;
  for (const t of times) {
    const candidate = zone.atTime(date, t);
    if (candidate < now && (!best || candidate > best)) best = candidate;
  }
  return best;
}

function mondayOf(date: PlainDate): PlainDate {
  return date.subtract({ days: date.dayOfWeek - 1 });
}

function weeksSince(anchor: PlainDate | null, date: PlainDate): number {
  return daysBetween(mondayOf(anchor ?? EPOCH_MONDAY), mondayOf(date)) / 7;
}

function monthAligned(ym: YearMonth, interval: number, anchor: PlainDate | null): boolean {
  if (interval <= 1) return true;
  return euclidMod(monthsBetween(anchor ?? EPOCH_DATE, ym), interval) === 0;
}

function yearAligned(year: number, interval: number, anchor: PlainDate | null): boolean {
  if (interval <= 1) return true;
  return euclidMod(year - (anchor ?? EPOCH_DATE).year, interval) === 0;
}

function intervalStep(expr: Extract<ScheduleExpr, { kind: "interval" }>): number {
  return expr.unit === "hours" ? expr.interval * 60 : expr.interval;
}

function slotTime(slot: number): TimeOfDay {
  return { hour: Math.floor(slot / 60), minute: slot % 60 };
}

// --- forward search per variant ---

function nextDayRepeat(expr: Extract<ScheduleExpr, { kind: "day" }>, ctx: Context, now: Date): Date | null {
  const today = ctx.zone.dateOf(now);
  if (expr.interval <= 1) {
    for (let i = 0; i <= DAY_SCAN; i++) {
      const d = today.add({ days: i });
      if (!matchesDayFilter(d, expr.days)) continue;
      const candidate = earliestAfter(d, expr.times, ctx.zone, now);
      if (candidate) return candidate;
    }
    return null;
  }
  const remainder = euclidMod(daysBetween(ctx.anchor ?? EPOCH_DATE, today), expr.interval);
  let d = remainder ? today.add({ days: expr.interval - remainder }) : today;
  for (let i = 0; i < LONG_DAY_SCAN; i++) {
    const candidate = earliestAfter(d, expr.times, ctx.zone, now);
    if (candidate) return candidate;
    d = d.add({ days: expr.interval });
  }
  return null;
}

function nextIntervalRepeat(expr: Extract<ScheduleExpr, { kind: "interval" }>, ctx: Context, now: Date): Date | null {
  const step = intervalStep(expr);
  const from = timeMinutes(expr.from);
  const to = timeMinutes(expr.to);
  const today = ctx.zone.dateOf(now);
  const nowMinutes = ctx.zone.minutesOf(now);

  for (let i = 0; i < LONG_DAY_SCAN; i++) {
    const d = today.add({ days: i });
    if (expr.dayFilter && !matchesDayFilter(d, expr.dayFilter)) continue;
    const elapsed = i === 0 ? nowMinutes : -1;
    const slot = elapsed < from ? from : from + (Math.floor((elapsed - from) / step) + 1) * step;
    if (slot > to) continue;
    const candidate = ctx.zone.atTime(d, slotTime(slot));
    if (candidate > now) return candidate;
  }
  return null;
}

function nextWeekRepeat(expr: Extract<ScheduleExpr, { kind: "week" }>, ctx: Context, now: Date): Date | null {
  const days = [...expr.days].sort((a, b) => weekdayNumber(a) - weekdayNumber(b));
  let monday = mondayOf(ctx.zone.dateOf(now));

  for (let i = 0; i < WEEK_SCAN; i++) {
    const remainder = euclidMod(weeksSince(ctx.anchor, monday), expr.interval);
    if (remainder === 0) {
      for (const day of days) {
        const candidate = earliestAfter(monday.add({ days: weekdayNumber(day) - 1 }), expr.times, ctx.zone, now);
        if (candidate) return candidate;
      }
    }
    monday = monday.add({ weeks: remainder ? expr.interval - remainder : expr.interval });
  }
  return null;
}

function nextMonthRepeat(interval: number, target: MonthTarget, times: readonly TimeOfDay[], ctx: Context, now: Date): Date | null {
  let ym = ctx.zone.dateOf(now).toPlainYearMonth();

  for (let i = 0; i < MONTH_SCAN_PER_INTERVAL * Math.max(interval, 1); i++) {
    if (monthAligned(ym, interval, ctx.anchor)) {
      let best: Date | null = null;
      for (const d of monthCandidates(ym, target)) {
        const candidate = earliestAfter(d, times, ctx.zone, now);
        if (candidate && (!best || candidate < best)) best = candidate;
      }
      if (best) return best;
    }
    ym = ym.add({ months: 1 });
  }
  return null;
}

function nextSingleDate(expr: Extract<ScheduleExpr, { kind: "singleDate" }>, ctx: Context, now: Date): Date | null {
  if (expr.date.kind === "iso") {
    const d = parseIsoDate(expr.date.date);
    return d ? earliestAfter(d, expr.times, ctx.zone, now) : null;
  }
  const startYear = ctx.zone.dateOf(now).year;
  const month = monthNumber(expr.date.month);
  for (let y = 0; y < YEAR_SCAN_PER_INTERVAL; y++) {
    const d = dateIn(yearMonth(startYear + y, month), expr.date.day);
    const candidate = d && earliestAfter(d, expr.times, ctx.zone, now);
    if (candidate) return candidate;
  }
  return null;
}

function nextYearRepeat(expr: Extract<ScheduleExpr, { kind: "year" }>, ctx: Context, now: Date): Date | null {
  const startYear = ctx.zone.dateOf(now).year;
  for (let y = 0; y < YEAR_SCAN_PER_INTERVAL * Math.max(expr.interval, 1); y++) {
    const year = startYear + y;
    if (!yearAligned(year, expr.interval, ctx.anchor)) continue;
    const d = yearTargetDate(year, expr.target);
    const candidate = d && earliestAfter(d, expr.times, ctx.zone, now);
    if (candidate) return candidate;
  }
  return null;
}

function nextExpr(expr: ScheduleExpr, ctx: Context, now: Date): Date | null {
  switch (expr.kind) {
    case "day": return nextDayRepeat(expr, ctx, now);
    case "interval": return nextIntervalRepeat(expr, ctx, now);
    case "week": return nextWeekRepeat(expr, ctx, now);
    case "month": return nextMonthRepeat(expr.interval, expr.target, expr.times, ctx, now);
    case "ordinal": return nextMonthRepeat(expr.interval, { kind: "ordinalWeekday", ordinal: expr.ordinal, weekday: expr.weekday }, expr.times, ctx, now);
    case "singleDate": return nextSingleDate(expr, ctx, now);
    case "year": return nextYearRepeat(expr, ctx, now);
  }
}

// --- backward search per variant ---

function prevDayRepeat(expr: Extract<ScheduleExpr, { kind: "day" }>, ctx: Context, now: Date): Date | null {
  const today = ctx.zone.dateOf(now);
  if (expr.interval <= 1) {
    for (let i = 0; i <= DAY_SCAN; i++) {
      const d = today.subtract({ days: i });
      if (!matchesDayFilter(d, expr.days)) continue;
      const candidate = latestBefore(d, expr.times, ctx.zone, now);
      if (candidate) return candidate;
    }
    return null;
  }
  let d = today.subtract({ days: euclidMod(daysBetween(ctx.anchor ?? EPOCH_DATE, today), expr.interval) });
  for (let i = 0; i < ALIGNED_DAY_SCAN; i++) {
    const candidate = latestBefore(d, expr.times, ctx.zone, now);
    if (candidate) return candidate;
    d = d.subtract({ days: expr.interval });
  }
  return null;
}

function prevIntervalRepeat(expr: Extract<ScheduleExpr, { kind: "interval" }>, ctx: Context, now: Date): Date | null {
  const step = intervalStep(expr);
  const from = timeMinutes(expr.from);
  const to = timeMinutes(expr.to);
  const today = ctx.zone.dateOf(now);
  const nowMinutes = ctx.zone.minutesOf(now);

  for (let i = 0; i < DAY_SCAN; i++) {
    const d = today.subtract({ days: i });
    if (expr.dayFilter && !matchesDayFilter(d, expr.dayFilter)) continue;
    const until = i === 0 ? Math.min(nowMinutes, to) : to;
    if (until < from) continue;
    let slot = from + Math.floor((until - from) / step) * step;
    let candidate = ctx.zone.atTime(d, slotTime(slot));
    if (candidate >= now) {
      slot -= step;
      if (slot < from) continue;
      candidate = ctx.zone.atTime(d, slotTime(slot));
    }
    return candidate;
  }
  return null;
}

function prevWeekRepeat(expr: Extract<ScheduleExpr, { kind: "week" }>, ctx: Context, now: Date): Date | null {
  const days = [...expr.days].sort((a, b) => weekdayNumber(b) - weekdayNumber(a));
  const today = ctx.zone.dateOf(now);
  let monday = mondayOf(today);

  for (let i = 0; i < WEEK_SCAN; i++) {
    const remainder = euclidMod(weeksSince(ctx.anchor, monday), expr.interval);
    if (remainder === 0) {
      for (const day of days) {
        const d = monday.add({ days: weekdayNumber(day) - 1 });
        if (compare(d, today) > 0) continue;
        const candidate = latestBefore(d, expr.times, ctx.zone, now);
        if (candidate) return candidate;
      }
    }
    monday = monday.subtract({ weeks: remainder || expr.interval });
  }
  return null;
}

function prevMonthRepeat(interval: number, target: MonthTarget, times: readonly TimeOfDay[], ctx: Context, now: Date): Date | null {
  const today = ctx.zone.dateOf(now);
  // Directed nearest-weekday targets can land in the previous month, so start one month ahead.
  let ym = today.toPlainYearMonth().add({ months: 1 });

  for (let i = 0; i < MONTH_SCAN_PER_INTERVAL * Math.max(interval, 1); i++) {
    if (monthAligned(ym, interval, ctx.anchor)) {
      const dates = monthCandidates(ym, target)
        .filter((d) => compare(d, today) <= 0)
        .sort((a, b) => compare(b, a));
      for (const d of dates) {
        const candidate = latestBefore(d, times, ctx.zone, now);
        if (candidate) return candidate;
      }
    }
    ym = ym.subtract({ months: 1 });
  }
  return null;
}

function prevSingleDate(expr: Extract<ScheduleExpr, { kind: "singleDate" }>, ctx: Context, now: Date): Date | null {
  const today = ctx.zone.dateOf(now);
  if (expr.date.kind === "iso") {
    const d = parseIsoDate(expr.date.date);
    return d && compare(d, today) <= 0 ? latestBefore(d, expr.times, ctx.zone, now) : null;
  }
  const month = monthNumber(expr.date.month);
  for (let y = 0; y < YEAR_SCAN_PER_INTERVAL; y++) {
    const d = dateIn(yearMonth(today.year - y, month), expr.date.day);
    if (!d || compare(d, today) > 0) continue;
    const candidate = latestBefore(d, expr.times, ctx.zone, now);
    if (candidate) return candidate;
  }
  return null;
}

function prevYearRepeat(expr: Extract<ScheduleExpr, { kind: "year" }>, ctx: Context, now: Date): Date | null {
  const today = ctx.zone.dateOf(now);
  for (let y = 0; y < YEAR_SCAN_PER_INTERVAL * Math.max(expr.interval, 1); y++) {
    const year = today.year - y;
    if (!yearAligned(year, expr.interval, ctx.anchor)) continue;
    const d = yearTargetDate(year, expr.target);
    if (!d || compare(d, today) > 0) continue;
    const candidate = latestBefore(d, expr.times, ctx.zone, now);
    if (candidate) return candidate;
  }
  return null;
}

function prevExpr(expr: ScheduleExpr, ctx: Context, now: Date): Date | null {
  switch (expr.kind) {
    case "day": return prevDayRepeat(expr, ctx, now);
    case "interval": return prevIntervalRepeat(expr, ctx, now);
    case "week": return prevWeekRepeat(expr, ctx, now);
    case "month": return prevMonthRepeat(expr.interval, expr.target, expr.times, ctx, now);
    case "ordinal": return prevMonthRepeat(expr.interval, { kind: "ordinalWeekday", ordinal: expr.ordinal, weekday: expr.weekday }, expr.times, ctx, now);
    case "singleDate": return prevSingleDate(expr, ctx, now);
    case "year": return prevYearRepeat(expr, ctx, now);
  }
}

// --- public operations ---

/** The first occurrence strictly after `now`, or null when the schedule is exhausted. */
export function nextFrom(schedule: ScheduleData, now: Date, zone?: Zone): Date | null {
  const ctx = contextFor(schedule, zone);
  const until = schedule.until ? resolveUntil(schedule.until, ctx.zone.dateOf(now)) : null;
  let cursor = now;

  // Nothing fires before the starting date.
  if (ctx.anchor) {
    const start = new Date(ctx.zone.atTime(ctx.anchor, MIDNIGHT).getTime() - SECOND);
    if (cursor < start) cursor = start;
  }

  for (let i = 0; i < MAX_ITERATIONS; i++) {
    const candidate = nextExpr(schedule.expr, ctx, cursor);
    if (!candidate) return null;
    const date = ctx.zone.dateOf(candidate);

    if (until && compare(date, until) > 0) return null;

    if (schedule.during.length && !inDuring(date, schedule.during)) {
      const skipTo = nextDuringMonth(date, schedule.during);
      cursor = new Date(ctx.zone.atTime(skipTo, MIDNIGHT).getTime() - SECOND);
      continue;
    }

    if (schedule.except.length && isExcepted(date, schedule.except)) {
      cursor = new Date(ctx.zone.atTime(date.add({ days: 1 }), MIDNIGHT).getTime() - SECOND);
      continue;
    }

    return candidate;
  }
  return null;
}

/** The latest occurrence strictly before `now`. */
export function previousFrom(schedule: ScheduleData, now: Date, zone?: Zone): Date | null {
  const ctx = contextFor(schedule, zone);
  const until = schedule.until ? resolveUntil(schedule.until, ctx.zone.dateOf(now)) : null;
  let cursor = now;

  for (let i = 0; i < MAX_ITERATIONS; i++) {
    const candidate = prevExpr(schedule.expr, ctx, cursor);
    if (!candidate) return null;
    const date = ctx.zone.dateOf(candidate);

    if (ctx.anchor && compare(date, ctx.anchor) < 0) return null;

    if (until && compare(date, until) > 0) {
      cursor = new Date(ctx.zone.atTime(until, END_OF_DAY).getTime() + SECOND);
      continue;
    }

    if (schedule.during.length && !inDuring(date, schedule.during)) {
      cursor = new Date(ctx.zone.atTime(prevDuringMonth(date, schedule.during), END_OF_DAY).getTime() + SECOND);
      continue;
    }

    if (schedule.except.length && isExcepted(date, schedule.except)) {
      cursor = new Date(ctx.zone.atTime(date.subtract({ days: 1 }), END_OF_DAY).getTime() + SECOND);
      continue;
    }

    return candidate;
  }
  return null;
}

/** Membership test against the instant's local date and time; no search involved. */
export function matches(schedule: ScheduleData, instant: Date, zone?: Zone): boolean {
  const ctx = contextFor(schedule, zone);
  const wall = ctx.zone.wallClock(instant);
  const date = wall.toPlainDate();
  const { expr } = schedule;

  if (ctx.anchor && compare(date, ctx.anchor) < 0) return false;
  if (!inDuring(date, schedule.during)) return false;
  if (isExcepted(date, schedule.except)) return false;
  if (schedule.until && compare(date, resolveUntil(schedule.until, date)) > 0) return false;

  // Literal wall-clock match, or the instant a gap-shifted time resolved to.
  const timeMatches = (times: readonly TimeOfDay[]): boolean =>
    times.some((t) => (wall.hour === t.hour && wall.minute === t.minute) || ctx.zone.atTime(date, t).getTime() === instant.getTime());
  const ym = date.toPlainYearMonth();

  switch (expr.kind) {
    case "day": {
      if (!matchesDayFilter(date, expr.days) || !timeMatches(expr.times)) return false;
      if (expr.interval <= 1) return true;
      return euclidMod(daysBetween(ctx.anchor ?? EPOCH_DATE, date), expr.interval) === 0;
    }
    case "interval": {
      if (expr.dayFilter && !matchesDayFilter(date, expr.dayFilter)) return false;
      const minutes = wall.hour * 60 + wall.minute;
      const from = timeMinutes(expr.from);
      if (minutes < from || minutes > timeMinutes(expr.to)) return false;
      return (minutes - from) % intervalStep(expr) === 0;
    }
    case "week": {
      if (!expr.days.some((d) => weekdayNumber(d) === date.dayOfWeek) || !timeMatches(expr.times)) return false;
      return euclidMod(weeksSince(ctx.anchor, date), expr.interval) === 0;
    }
    case "month": {
      if (!timeMatches(expr.times)) return false;
      // A directed nearest weekday may belong to the neighbouring month's target.
      const sources = expr.target.kind === "nearestWeekday" && expr.target.direction ? [ym.subtract({ months: 1 }), ym, ym.add({ months: 1 })] : [ym];
      return sources.some((src) => monthAligned(src, expr.interval, ctx.anchor) && monthCandidates(src, expr.target).some((d) => d.equals(date)));
    }
    case "ordinal": {
      if (!timeMatches(expr.times) || !monthAligned(ym, expr.interval, ctx.anchor)) return false;
      const d = ordinalDate(ym, expr.ordinal, expr.weekday);
      return d !== null && d.equals(date);
    }
    case "singleDate": {
      if (!timeMatches(expr.times)) return false;
      if (expr.date.kind === "named") return monthNumber(expr.date.month) === date.month && expr.date.day === date.day;
      const d = parseIsoDate(expr.date.date);
      return d !== null && d.equals(date);
    }
    case "year": {
      if (!timeMatches(expr.times) || !yearAligned(date.year, expr.interval, ctx.anchor)) return false;
      const d = yearTargetDate(date.year, expr.target);
      return d !== null && d.equals(date);
    }
  }
}

/**
 * Lazy occurrence stream strictly after `from`. Unbounded unless the schedule
 * has an until clause or runs out; each pull performs one bounded search.
 */
export function* occurrences(schedule: ScheduleData, from: Date, zone?: Zone): Generator<Date, void, undefined> {
  const resolved = zone ?? Zone.resolve(schedule.timezone);
  let cursor = from;
  for (;;) {
    const next = nextFrom(schedule, cursor, resolved);
    if (!next) return;
    // Step past the hit so the same occurrence is not found again.
    cursor = new Date(next.getTime() + MINUTE);
    yield next;
  }
}

/** Occurrences with `from < t <= to`. */
export function* between(schedule: ScheduleData, from: Date, to: Date, zone?: Zone): Generator<Date, void, undefined> {
  for (const t of occurrences(schedule, from, zone)) {
    if (t > to) return;
    yield t;
  }
}

export function nextNFrom(schedule: ScheduleData, now: Date, n: number, zone?: Zone): Date[] {
  const out: Date[] = [];
  if (n <= 0) return out;
  for (const t of occurrences(schedule, now, zone)) {
    out.push(t);
    if (out.length >= n) break;
  }
  return out;
}
