import { formatTime, ordinalNumber, type DateSpec, type DayFilter, type DayOfMonthSpec, type IntervalUnit, type MonthTarget, type ScheduleData, type ScheduleExpr, type TimeOfDay, type YearTarget } from "./ast.js";

const times = (list: readonly TimeOfDay[]): string => list.map(formatTime).join(", ");
const join = (list: readonly string[]): string => list.join(", ");

function unitWord(interval: number, unit: IntervalUnit): string {
  if (unit === "min") return interval === 1 ? "minute" : "min";
  return interval === 1 ? "hour" : "hours";
}

function dayFilter(filter: DayFilter): string {
  switch (filter.kind) {
    case "every": return "day";
    case "weekday": return "weekday";
    case "weekend": return "weekend";
    case "days": return join(filter.days);
  }
}

function daySpec(spec: DayOfMonthSpec): string {
  return spec.kind === "single" ? ordinalNumber(spec.day) : `${ordinalNumber(spec.start)} to ${ordinalNumber(spec.end)}`;
}

function monthTarget(target: Exclude<MonthTarget, { kind: "ordinalWeekday" }>): string {
  switch (target.kind) {
    case "days": return join(target.specs.map(daySpec));
    case "lastDay": return "last day";
    case "lastWeekday": return "last weekday";
    case "nearestWeekday": {
      const prefix = target.direction ? `${target.direction} ` : "";
      return `${prefix}nearest weekday to ${ordinalNumber(target.day)}`;
    }
  }
}

function yearTarget(target: YearTarget): string {
  switch (target.kind) {
    case "date": return `${target.month} ${target.day}`;
    case "ordinalWeekday": return `the ${target.ordinal} ${target.weekday} of ${target.month}`;
    case "dayOfMonth": return `the ${ordinalNumber(target.day)} of ${target.month}`;
    case "lastWeekday": return `the last weekday of ${target.month}`;
  }
}

function dateSpec(spec: DateSpec): string {
  return spec.kind === "iso" ? spec.date : `${spec.month} ${spec.day}`;
}

const everyMonth = (interval: number): string => (interval > 1 ? `every ${interval} months` : "every month");

function expression(expr: ScheduleExpr): string {
  switch (expr.kind) {
    case "interval": {
      const window = `every ${expr.interval} ${unitWord(expr.interval, expr.unit)} from ${formatTime(expr.from)} to ${formatTime(expr.to)}`;
      return expr.dayFilter ? `${window} on ${dayFilter(expr.dayFilter)}` : window;
    }
    case "day":
      if (expr.interval > 1) return `every ${expr.interval} days at ${times(expr.times)}`;
      return `every ${dayFilter(expr.days)} at ${times(expr.times)}`;
    case "week":
      return `every ${expr.interval} weeks on ${join(expr.days)} at ${times(expr.times)}`;
    case "month":
      // An ordinal-weekday month target shares the ordinal repeat's phrasing.
      if (expr.target.kind === "ordinalWeekday") {
        return `${expr.target.ordinal} ${expr.target.weekday} of ${everyMonth(expr.interval)} at ${times(expr.times)}`;
      }
      return `${everyMonth(expr.interval)} on the ${monthTarget(expr.target)} at ${times(expr.times)}`;
    case "ordinal":
      return `${expr.ordinal} ${expr.weekday} of ${everyMonth(expr.interval)} at ${times(expr.times)}`;
    case "singleDate":
      return `on ${dateSpec(expr.date)} at ${times(expr.times)}`;
    case "year": {
      const every = expr.interval > 1 ? `every ${expr.interval} years` : "every year";
      return `${every} on ${yearTarget(expr.target)} at ${times(expr.times)}`;
    }
  }
}

/** Canonical text for a schedule; parsing the result yields the same rendering. */
export function display(schedule: ScheduleData): string {
  let out = expression(schedule.expr);
  if (schedule.except.length) out += ` except ${join(schedule.except.map(dateSpec))}`;
  if (schedule.until) out += ` until ${dateSpec(schedule.until)}`;
  if (schedule.anchor) out += ` starting ${schedule.anchor}`;
  if (schedule.during.length) out += ` during ${join(schedule.during)}`;
  if (schedule.timezone) out += ` in ${schedule.timezone}`;
  return out;
}
