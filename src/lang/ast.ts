export const WEEKDAYS = ["monday", "tuesday", "wednesday", "thursday", "friday", "saturday", "sunday"] as const;
export const MONTHS = ["jan", "feb", "mar", "apr", "may", "jun", "jul", "aug", "sep", "oct", "nov", "dec"] as const;
export const ORDINALS = ["first", "second", "third", "fourth", "fifth", "last"] as const;

export type Weekday = (typeof WEEKDAYS)[number];
export type MonthName = (typeof MONTHS)[number];
export type OrdinalPosition = (typeof ORDINALS)[number];
export type IntervalUnit = "min" | "hours";
export type NearestDirection = "next" | "previous";

export interface TimeOfDay {
  readonly hour: number;
  readonly minute: number;
}

export type DayFilter =
  | { readonly kind: "every" }
  | { readonly kind: "weekday" }
  | { readonly kind: "weekend" }
  | { readonly kind: "days"; readonly days: readonly Weekday[] };

export type DayOfMonthSpec =
  | { readonly kind: "single"; readonly day: number }
  | { readonly kind: "range"; readonly start: number; readonly end: number };

export type MonthTarget =
  | { readonly kind: "days"; readonly specs: readonly DayOfMonthSpec[] }
  | { readonly kind: "lastDay" }
  | { readonly kind: "lastWeekday" }
  | { readonly kind: "nearestWeekday"; readonly day: number; readonly direction: NearestDirection | null }
  | { readonly kind: "ordinalWeekday"; readonly ordinal: OrdinalPosition; readonly weekday: Weekday };

export type YearTarget =
  | { readonly kind: "date"; readonly month: MonthName; readonly day: number }
  | { readonly kind: "ordinalWeekday"; readonly ordinal: OrdinalPosition; readonly weekday: Weekday; readonly month: MonthName }
  | { readonly kind: "dayOfMonth"; readonly day: number; readonly month: MonthName }
  | { readonly kind: "lastWeekday"; readonly month: MonthName };

/** A calendar date, either a yearly month/day or a literal YYYY-MM-DD. */
export type DateSpec =
  | { readonly kind: "named"; readonly month: MonthName; readonly day: number }
  | { readonly kind: "iso"; readonly date: string };

export type ExceptionSpec = DateSpec;
export type UntilSpec = DateSpec;

export type ScheduleExpr =
  | {
      readonly kind: "interval";
      readonly interval: number;
      readonly unit: IntervalUnit;
      readonly from: TimeOfDay;
      readonly to: TimeOfDay;
      readonly dayFilter: DayFilter | null;
    }
  | { readonly kind: "day"; readonly interval: number; readonly days: DayFilter; readonly times: readonly TimeOfDay[] }
  | { readonly kind: "week"; readonly interval: number; readonly days: readonly Weekday[]; readonly times: readonly TimeOfDay[] }
  | { readonly kind: "month"; readonly interval: number; readonly target: MonthTarget; readonly times: readonly TimeOfDay[] }
  | {
      readonly kind: "ordinal";
      readonly interval: number;
      readonly ordinal: OrdinalPosition;
      readonly weekday: Weekday;
      readonly times: readonly TimeOfDay[];
    }
  | { readonly kind: "singleDate"; readonly date: DateSpec; readonly times: readonly TimeOfDay[] }
  | { readonly kind: "year"; readonly interval: number; readonly target: YearTarget; readonly times: readonly TimeOfDay[] };

export interface ScheduleData {
  readonly expr: ScheduleExpr;
  readonly timezone: string | null;
  readonly except: readonly ExceptionSpec[];
  readonly until: UntilSpec | null;
  /** ISO date from the `starting` clause; alignment falls back to the epoch when absent. */
  readonly anchor: string | null;
  readonly during: readonly MonthName[];
}

export interface Clauses {
  timezone?: string | null;
  except?: readonly ExceptionSpec[];
  until?: UntilSpec | null;
  anchor?: string | null;
  during?: readonly MonthName[];
}

function deepFreeze<T>(value: T): T {
  if (value && typeof value === "object" && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) deepFreeze(child);
  }
  return value;
}

export function scheduleData(expr: ScheduleExpr, clauses: Clauses = {}): ScheduleData {
  return deepFreeze({
    expr,
    timezone: clauses.timezone ?? null,
    except: clauses.except ?? [],
    until: clauses.until ?? null,
    anchor: clauses.anchor ?? null,
    during: clauses.during ?? [],
  });
}

/** ISO weekday number, Monday = 1 … Sunday = 7. */
export function weekdayNumber(day: Weekday): number {
  return WEEKDAYS.indexOf(day) + 1;
}

export function weekdayFromNumber(n: number): Weekday {
  return WEEKDAYS[(((n - 1) % 7) + 7) % 7];
}

/** Cron day-of-week number, Sunday = 0 … Saturday = 6. */
export function cronDayNumber(day: Weekday): number {
  return weekdayNumber(day) % 7;
}

export function monthNumber(month: MonthName): number {
  return MONTHS.indexOf(month) + 1;
}

export function monthFromNumber(n: number): MonthName {
  return MONTHS[n - 1];
}

/** 1…5 for first…fifth; `last` has no fixed position. */
export function ordinalPosition(ordinal: Exclude<OrdinalPosition, "last">): number {
  return ORDINALS.indexOf(ordinal) + 1;
}

export function timeMinutes(t: TimeOfDay): number {
  return t.hour * 60 + t.minute;
}

export function formatTime(t: TimeOfDay): string {
  return `${String(t.hour).padStart(2, "0")}:${String(t.minute).padStart(2, "0")}`;
}

/** 1st, 2nd, 3rd, 4th … 11th, 12th, 13th … 21st. */
export function ordinalNumber(n: number): string {
  const mod100 = n % 100;
  const suffix = mod100 >= 11 && mod100 <= 13 ? "th" : (["th", "st", "nd", "rd"][n % 10] ?? "th");
  return `${n}${suffix}`;
}

export function expandDaySpecs(specs: readonly DayOfMonthSpec[]): number[] {
  const out: number[] = [];
  for (const spec of specs) {
    if (spec.kind === "single") out.push(spec.day);
    else for (let d = spec.start; d <= spec.end; d++) out.push(d);
  }
  return out;
}
