import {
  MONTHS,
  WEEKDAYS,
  cronDayNumber,
  expandDaySpecs,
  monthFromNumber,
  scheduleData,
  type DayFilter,
  type DayOfMonthSpec,
  type MonthName,
  type MonthTarget,
  type OrdinalPosition,
  type ScheduleData,
  type ScheduleExpr,
  type TimeOfDay,
  type Weekday,
} from "../lang/ast.js";
import { cronError, type ScheduleError } from "../lang/error.js";
import { KEYWORDS } from "../lang/tokens.js";

const FULL_DAY = { from: { hour: 0, minute: 0 }, to: { hour: 23, minute: 59 } };
const MIDNIGHT: TimeOfDay = { hour: 0, minute: 0 };

function unsupported(what: string): ScheduleError {
  return cronError(`not expressible as cron (${what})`);
}

function dayFilterToCron(filter: DayFilter): string {
  switch (filter.kind) {
    case "every": return "*";
    case "weekday": return "1-5";
    case "weekend": return "0,6";
    case "days": {
      // Same folding as fromCron, so the cron text survives a round trip.
      const numbers = [...new Set(filter.days.map(cronDayNumber))].sort((a, b) => a - b);
      if (numbers.join(",") === "1,2,3,4,5") return "1-5";
      return numbers.join(",");
    }
  }
}

function singleTime(times: readonly TimeOfDay[]): TimeOfDay {
  if (times.length !== 1) throw unsupported("multiple times not supported");
  return times[0];
}

function monthToCron(target: MonthTarget, t: TimeOfDay): string {
  switch (target.kind) {
    case "days":
      return `${t.minute} ${t.hour} ${expandDaySpecs(target.specs).join(",")} * *`;
    case "nearestWeekday":
      if (target.direction) throw unsupported(`${target.direction} nearest weekday not supported`);
      return `${t.minute} ${t.hour} ${target.day}W * *`;
    case "lastDay":
      throw unsupported("last day of month not supported");
    case "lastWeekday":
      throw unsupported("last weekday of month not supported");
    case "ordinalWeekday":
      throw unsupported("ordinal weekday of month not supported");
  }
}

/** Converts a schedule to 5-field cron, refusing any shape cron cannot express exactly. */
export function toCron(schedule: ScheduleData): string {
  if (schedule.except.length) throw unsupported("except clauses not supported");
  if (schedule.until) throw unsupported("until clauses not supported");
  if (schedule.during.length) throw unsupported("during clauses not supported");

  const { expr } = schedule;
  switch (expr.kind) {
    case "day": {
      if (expr.interval > 1) throw unsupported("multi-day intervals not supported");
      const t = singleTime(expr.times);
      return `${t.minute} ${t.hour} * * ${dayFilterToCron(expr.days)}`;
    }
    case "interval": {
      const fullDay = expr.from.hour === 0 && expr.from.minute === 0 && expr.to.hour === 23 && expr.to.minute === 59;
      if (!fullDay) throw unsupported("partial-day interval windows not supported");
      const dow = expr.dayFilter ? dayFilterToCron(expr.dayFilter) : "*";
      if (expr.unit === "min") {
        if (60 % expr.interval !== 0) throw unsupported(`*/${expr.interval} breaks at hour boundaries`);
        return `*/${expr.interval} * * * ${dow}`;
      }
      if (expr.interval > 23) throw unsupported(`hour step ${expr.interval} exceeds a day`);
      return `0 */${expr.interval} * * ${dow}`;
    }
    case "week":
      throw unsupported("multi-week intervals not supported");
    case "month":
      if (expr.interval > 1) throw unsupported("multi-month intervals not supported");
      return monthToCron(expr.target, singleTime(expr.times));
    case "ordinal":
      throw unsupported("ordinal weekday of month not supported");
    case "singleDate":
      throw unsupported("single dates are not repeating");
    case "year":
      throw unsupported("yearly schedules not supported in 5-field cron");
  }
}

// --- fromCron ---

const SHORTCUTS: Record<string, () => ScheduleData> = {
  "@yearly": () => scheduleData({ kind: "year", interval: 1, target: { kind: "date", month: "jan", day: 1 }, times: [MIDNIGHT] }),
  "@annually": () => SHORTCUTS["@yearly"](),
  "@monthly": () => scheduleData({ kind: "month", interval: 1, target: { kind: "days", specs: [{ kind: "single", day: 1 }] }, times: [MIDNIGHT] }),
  "@weekly": () => scheduleData({ kind: "day", interval: 1, days: { kind: "days", days: ["sunday"] }, times: [MIDNIGHT] }),
  "@daily": () => scheduleData({ kind: "day", interval: 1, days: { kind: "every" }, times: [MIDNIGHT] }),
  "@midnight": () => SHORTCUTS["@daily"](),
  "@hourly": () => scheduleData({ kind: "interval", interval: 1, unit: "hours", ...FULL_DAY, dayFilter: null }),
};

function toInt(text: string, message: string): number {
  if (!/^\d+$/.test(text)) throw cronError(message);
  return Number(text);
}

function inRange(value: number, name: string, min: number, max: number): number {
  if (value < min || value > max) throw cronError(`${name} must be ${min}-${max}, got ${value}`);
  return value;
}

function parseStep(text: string, name: string): number {
  const step = toInt(text, `invalid ${name} step: ${text}`);
  if (step === 0) throw cronError("step cannot be 0");
  return step;
}

/** `a-b/n` → ["a-b", "n"]; no step gives undefined. */
function splitStep(part: string): [string, string | undefined] {
  const slash = part.indexOf("/");
  return slash < 0 ? [part, undefined] : [part.slice(0, slash), part.slice(slash + 1)];
}

function splitRange(text: string): [string, string] | null {
  const dash = text.indexOf("-");
  return dash < 0 ? null : [text.slice(0, dash), text.slice(dash + 1)];
}

function checkOrder(start: number, end: number, text: string): void {
  if (start > end) throw cronError(`range start must be <= end: ${text}`);
}

function parseMonthValue(text: string): number {
  if (/^\d+$/.test(text)) return inRange(Number(text), "month", 1, 12);
  const kw = KEYWORDS.get(text.toLowerCase());
  if (kw?.kind === "monthName") return MONTHS.indexOf(kw.month) + 1;
  throw cronError(`invalid month: ${text}`);
}

/** The month field becomes the `during` clause. */
function parseMonthField(field: string): MonthName[] {
  if (field === "*") return [];
  const months: number[] = [];
  for (const part of field.split(",")) {
    const [rangePart, stepText] = splitStep(part);
    let start: number;
    let end: number;
    const range = splitRange(rangePart);
    if (rangePart === "*") {
      [start, end] = [1, 12];
    } else if (range) {
      [start, end] = [parseMonthValue(range[0]), parseMonthValue(range[1])];
      checkOrder(start, end, rangePart);
    } else if (stepText === undefined) {
      months.push(parseMonthValue(rangePart));
      continue;
    } else {
      throw cronError(`invalid month step expression: ${part}`);
    }
    const step = stepText === undefined ? 1 : parseStep(stepText, "month");
    for (let m = start; m <= end; m += step) months.push(m);
  }
  return [...new Set(months)].sort((a, b) => a - b).map(monthFromNumber);
}

/** Day-of-week number 0..7 (7 is Sunday) or a three-letter name. */
function parseDowValue(text: string): number {
  if (/^\d+$/.test(text)) return inRange(Number(text), "DOW", 0, 7);
  const index = ["sun", "mon", "tue", "wed", "thu", "fri", "sat"].indexOf(text.toLowerCase());
  if (index < 0) throw cronError(`invalid DOW: ${text}`);
  return index;
}

function weekdayFromCron(n: number): Weekday {
  return WEEKDAYS[(n + 6) % 7];
}

const sameDays = (days: ReadonlySet<Weekday>, expected: readonly Weekday[]): boolean =>
  days.size === expected.length && expected.every((d) => days.has(d));

function parseDowField(field: string): DayFilter {
  if (field === "*") return { kind: "every" };
  const days: Weekday[] = [];
  for (const part of field.split(",")) {
    const [rangePart, stepText] = splitStep(part);
    const range = splitRange(rangePart);
    let start: number;
    let end: number;
    if (rangePart === "*") {
      [start, end] = [0, 6];
    } else if (range) {
      [start, end] = [parseDowValue(range[0]), parseDowValue(range[1])];
      checkOrder(start, end, rangePart);
    } else {
      start = parseDowValue(rangePart);
      end = stepText === undefined ? start : 6;
    }
    const step = stepText === undefined ? 1 : parseStep(stepText, "DOW");
    for (let d = start; d <= end; d += step) days.push(weekdayFromCron(d));
  }

  const unique = new Set(days);
  if (sameDays(unique, WEEKDAYS.slice(0, 5))) return { kind: "weekday" };
  if (sameDays(unique, ["saturday", "sunday"])) return { kind: "weekend" };
  return { kind: "days", days: [...unique] };
}

function parseDomValue(text: string): number {
  return inRange(toInt(text, `invalid DOM value: ${text}`), "DOM", 1, 31);
}

function parseDomField(field: string): DayOfMonthSpec[] {
  const specs: DayOfMonthSpec[] = [];
  for (const part of field.split(",")) {
    const [rangePart, stepText] = splitStep(part);
    const range = splitRange(rangePart);
    if (stepText !== undefined) {
      let start: number;
      let end: number;
      if (rangePart === "*") [start, end] = [1, 31];
      else if (range) [start, end] = [parseDomValue(range[0]), parseDomValue(range[1])];
      else [start, end] = [parseDomValue(rangePart), 31];
      checkOrder(start, end, rangePart);
      const step = parseStep(stepText, "DOM");
      for (let d = start; d <= end; d += step) specs.push({ kind: "single", day: d });
    } else if (range) {
      const [start, end] = [parseDomValue(range[0]), parseDomValue(range[1])];
      checkOrder(start, end, rangePart);
      specs.push({ kind: "range", start, end });
    } else {
      specs.push({ kind: "single", day: parseDomValue(rangePart) });
    }
  }
  return specs;
}

/** Minute and hour fields accept a value or a comma list; the cross product becomes the time list. */
function parseTimes(minuteField: string, hourField: string): TimeOfDay[] {
  const minutes = minuteField.split(",").map((m) => inRange(toInt(m, `invalid minute field: ${minuteField}`), "minute", 0, 59));
  const hours = hourField.split(",").map((h) => inRange(toInt(h, `invalid hour field: ${hourField}`), "hour", 0, 23));
  const times: TimeOfDay[] = [];
  for (const hour of [...new Set(hours)].sort((a, b) => a - b)) {
    for (const minute of [...new Set(minutes)].sort((a, b) => a - b)) times.push({ hour, minute });
  }
  return times;
}

const wildcard = (field: string): boolean => field === "*";

function parseIntervalFields(minuteField: string, hourField: string, dowField: string): ScheduleExpr | null {
  if (minuteField.includes("/")) {
    if (hourField.includes("/")) throw cronError(`minute and hour steps together not supported: ${minuteField} ${hourField}`);
    const [rangePart, stepText = ""] = splitStep(minuteField);
    const interval = parseStep(stepText, "minute");
    const range = splitRange(rangePart);

    let fromHour = 0;
    let toHour = 23;
    const hourRange = splitRange(hourField);
    if (hourRange) {
      [fromHour, toHour] = hourRange.map((h) => inRange(toInt(h, "invalid hour range"), "hour", 0, 23));
      checkOrder(fromHour, toHour, hourField);
    } else if (!wildcard(hourField)) {
      fromHour = toHour = inRange(toInt(hourField, `invalid hour field: ${hourField}`), "hour", 0, 23);
    }

    let fromMinute = 0;
    let toMinute = 59;
    if (range) {
      // A minute range repeats every hour, which only a single-hour window can express.
      if (fromHour !== toHour) throw cronError(`minute ranges with steps need a single hour: ${minuteField}`);
      [fromMinute, toMinute] = range.map((m) => inRange(toInt(m, "invalid minute range"), "minute", 0, 59));
      checkOrder(fromMinute, toMinute, rangePart);
    } else if (!wildcard(rangePart)) {
      fromMinute = inRange(toInt(rangePart, `invalid minute field: ${minuteField}`), "minute", 0, 59);
    }

    return {
      kind: "interval",
      interval,
      unit: "min",
      from: { hour: fromHour, minute: fromMinute },
      to: { hour: toHour, minute: toMinute },
      dayFilter: wildcard(dowField) ? null : parseDowField(dowField),
    };
  }

  if (hourField.includes("/")) {
    if (minuteField !== "0" && minuteField !== "00") throw cronError(`hour steps need minute 0: ${minuteField}`);
    const [rangePart, stepText = ""] = splitStep(hourField);
    const interval = parseStep(stepText, "hour");
    const range = splitRange(rangePart);
    let [fromHour, toHour] = [0, 23];
    if (range) {
      [fromHour, toHour] = range.map((h) => inRange(toInt(h, "invalid hour range"), "hour", 0, 23));
      checkOrder(fromHour, toHour, rangePart);
    } else if (!wildcard(rangePart)) {
      fromHour = inRange(toInt(rangePart, `invalid hour field: ${hourField}`), "hour", 0, 23);
    }
    const fullDay = fromHour === 0 && toHour === 23;
    return {
      kind: "interval",
      interval,
      unit: "hours",
      from: { hour: fromHour, minute: 0 },
      to: { hour: toHour, minute: fullDay ? 59 : 0 },
      dayFilter: wildcard(dowField) ? null : parseDowField(dowField),
    };
  }
  return null;
}

function ordinalFromCron(n: number): OrdinalPosition {
  const ordinals = ["first", "second", "third", "fourth", "fifth"] as const;
  if (n < 1 || n > 5) throw cronError(`nth must be 1-5, got ${n}`);
  return ordinals[n - 1];
}

function parseDowSpecial(dowField: string): { ordinal: OrdinalPosition; weekday: Weekday } | null {
  const hash = /^(\w+)#(\d+)$/.exec(dowField);
  if (hash) return { weekday: weekdayFromCron(parseDowValue(hash[1])), ordinal: ordinalFromCron(Number(hash[2])) };
  const last = /^(\w+)L$/.exec(dowField);
  if (last) return { weekday: weekdayFromCron(parseDowValue(last[1])), ordinal: "last" };
  if (dowField.includes("#")) throw cronError(`invalid nth weekday: ${dowField}`);
  return null;
}

function parseExpr(minuteField: string, hourField: string, domField: string, dowField: string): ScheduleExpr {
  const special = parseDowSpecial(dowField);
  if (special) {
    if (!wildcard(domField)) throw cronError(`DOM must be * when using ${dowField.includes("#") ? "#" : "nL"} in DOW`);
    return { kind: "ordinal", interval: 1, ...special, times: parseTimes(minuteField, hourField) };
  }

  if (domField === "L" || domField === "LW") {
    if (!wildcard(dowField)) throw cronError("DOW must be * when using L or LW in DOM");
    return {
      kind: "month",
      interval: 1,
      target: domField === "L" ? { kind: "lastDay" } : { kind: "lastWeekday" },
      times: parseTimes(minuteField, hourField),
    };
  }

  if (domField.includes("W")) {
    const nearest = /^(\d+)W$/.exec(domField);
    if (!nearest) throw cronError(`W needs a single day of month: ${domField}`);
    if (!wildcard(dowField)) throw cronError("DOW must be * when using W in DOM");
    return {
      kind: "month",
      interval: 1,
      target: { kind: "nearestWeekday", day: parseDomValue(nearest[1]), direction: null },
      times: parseTimes(minuteField, hourField),
    };
  }

  if (wildcard(domField)) {
    const interval = parseIntervalFields(minuteField, hourField, dowField);
    if (interval) return interval;
  } else if (minuteField.includes("/") || hourField.includes("/")) {
    throw cronError("steps with a day-of-month field not supported");
  }

  const times = parseTimes(minuteField, hourField);
  if (!wildcard(domField)) {
    if (!wildcard(dowField)) throw cronError("DOM and DOW together not supported");
    return { kind: "month", interval: 1, target: { kind: "days", specs: parseDomField(domField) }, times };
  }
  return { kind: "day", interval: 1, days: parseDowField(dowField), times };
}

/** Parses 5-field cron or an `@` shortcut. `?` is read as `*`. */
export function fromCron(cron: string): ScheduleData {
  const text = cron.trim();
  if (text.startsWith("@")) {
    const shortcut = SHORTCUTS[text.toLowerCase()];
    if (!shortcut) throw cronError(`unknown @ shortcut: ${text}`);
    return shortcut();
  }

  const fields = text.split(/\s+/).filter(Boolean).map((f) => (f === "?" ? "*" : f));
  if (fields.length !== 5) throw cronError(`expected 5 cron fields, got ${fields.length}`);
  const [minuteField, hourField, domField, monthField, dowField] = fields;

  const during = parseMonthField(monthField);
  const expr = parseExpr(minuteField, hourField, domField, dowField);
  return scheduleData(expr, { during });
}
