import { Schedule } from "./schedule.js";

export { Schedule } from "./schedule.js";
export { parse } from "./lang/parser.js";
export { display } from "./lang/display.js";
export { nextFrom, previousFrom, matches, nextNFrom, occurrences, between } from "./eval/evaluator.js";
export { toCron, fromCron } from "./cron/bridge.js";
export { explainCron } from "./cron/explain.js";
export { verifyCron, type CronVerification } from "./cron/verify.js";
export { ScheduleError, isScheduleError, type ErrorKind, type Span } from "./lang/error.js";
export type {
  ScheduleData,
  ScheduleExpr,
  TimeOfDay,
  DayFilter,
  DayOfMonthSpec,
  MonthTarget,
  YearTarget,
  DateSpec,
  ExceptionSpec,
  UntilSpec,
  Weekday,
  MonthName,
  IntervalUnit,
  OrdinalPosition,
  NearestDirection,
} from "./lang/ast.js";

export function validate(input: string): boolean {
  return Schedule.validate(input);
}
