import { scheduleData, type ScheduleData } from "./lang/ast.js";
import { display } from "./lang/display.js";
import { parseError } from "./lang/error.js";
import { parse } from "./lang/parser.js";
import { parseIsoDate } from "./eval/calendar.js";
import { Zone } from "./eval/zone.js";
import * as evaluator from "./eval/evaluator.js";
import { fromCron, toCron } from "./cron/bridge.js";

/**
 * A parsed schedule bound to its resolved time zone. Instances are immutable;
 * `withAnchor` returns a copy.
 */
export class Schedule {
  private readonly zone: Zone;

  private constructor(readonly expression: ScheduleData) {
    this.zone = Zone.resolve(expression.timezone);
  }

  static parse(input: string): Schedule {
    return new Schedule(parse(input));
  }

  static fromCron(cron: string): Schedule {
    return new Schedule(fromCron(cron));
  }

  static fromData(data: ScheduleData): Schedule {
    return new Schedule(data);
  }

  /** True when the input parses and its zone resolves. */
  static validate(input: string): boolean {
    try {
      Schedule.parse(input);
      return true;
    } catch {
      return false;
    }
  }

  get timezone(): string | undefined {
    return this.expression.timezone ?? undefined;
  }

  nextFrom(now: Date): Date | null {
    return evaluator.nextFrom(this.expression, now, this.zone);
  }

  previousFrom(now: Date): Date | null {
    return evaluator.previousFrom(this.expression, now, this.zone);
  }

  nextNFrom(now: Date, n: number): Date[] {
    return evaluator.nextNFrom(this.expression, now, n, this.zone);
  }

  matches(instant: Date): boolean {
    return evaluator.matches(this.expression, instant, this.zone);
  }

  occurrences(from: Date): Generator<Date, void, undefined> {
    return evaluator.occurrences(this.expression, from, this.zone);
  }

  between(from: Date, to: Date): Generator<Date, void, undefined> {
    return evaluator.between(this.expression, from, to, this.zone);
  }

  toCron(): string {
    return toCron(this.expression);
  }

  withAnchor(isoDate: string): Schedule {
    if (!parseIsoDate(isoDate)) {
      throw parseError(`invalid starting date: ${isoDate}`, { start: 0, end: isoDate.length }, isoDate);
    }
    const { expr, ...clauses } = this.expression;
    return new Schedule(scheduleData(expr, { ...clauses, anchor: isoDate }));
  }

  toString(): string {
    return display(this.expression);
  }
}
