import {
  formatTime,
  monthNumber,
  ordinalNumber,
  scheduleData,
  type Clauses,
  type DateSpec,
  type DayFilter,
  type DayOfMonthSpec,
  type MonthName,
  type MonthTarget,
  type NearestDirection,
  type OrdinalPosition,
  type ScheduleData,
  type ScheduleExpr,
  type TimeOfDay,
  type Weekday,
  type YearTarget,
} from "./ast.js";
import { parseError, type ScheduleError, type Span } from "./error.js";
import { tokenize } from "./lexer.js";
import { describeToken, type KeywordKind, type Token, type TokenKind } from "./tokens.js";
import { daysInMonth, parseIsoDate } from "../eval/calendar.js";

type ValueKind = Exclude<TokenKind, KeywordKind>;
type TokenOf<K extends TokenKind> = Extract<Token, { kind: K }>;

function isKind<K extends TokenKind>(tok: Token | undefined, kind: K): tok is TokenOf<K> {
  return tok !== undefined && tok.kind === kind;
}

class Parser {
  private pos = 0;

  constructor(private readonly tokens: Token[], private readonly input: string) {}

  // --- token helpers ---

  private peek(): Token | undefined {
    return this.tokens[this.pos];
  }

  private check(kind: TokenKind): boolean {
    return this.peek()?.kind === kind;
  }

  private take<K extends ValueKind>(kind: K): TokenOf<K> | null {
    const tok = this.peek();
    if (!isKind(tok, kind)) return null;
    this.pos++;
    return tok;
  }

  private accept(kind: KeywordKind | "comma"): boolean {
    if (!this.check(kind)) return false;
    this.pos++;
    return true;
  }

  private currentSpan(): Span {
    const tok = this.peek();
    if (tok) return tok.span;
    const end = this.tokens.length ? this.tokens[this.tokens.length - 1].span.end : 0;
    return { start: end, end };
  }

  private fail(message: string, span = this.currentSpan(), suggestion?: string): ScheduleError {
    return parseError(message, span, this.input, suggestion);
  }

  /** "expected X, got Y" at the offending token, or "expected X" at end of input. */
  private expected(what: string): ScheduleError {
    const tok = this.peek();
    return tok ? this.fail(`expected ${what}, got ${describeToken(tok)}`) : this.fail(`expected ${what}`);
  }

  private expect(kind: KeywordKind): void {
    if (!this.accept(kind)) throw this.expected(`'${kind}'`);
  }

  private expectValue<K extends ValueKind>(kind: K, what: string): TokenOf<K> {
    const tok = this.take(kind);
    if (!tok) throw this.expected(what);
    return tok;
  }

  finish(): void {
    if (this.peek()) throw this.fail("unexpected tokens after expression");
  }

  // --- grammar ---

  parseExpression(): ScheduleData {
    let expr: ScheduleExpr;
    if (this.accept("every")) expr = this.parseEvery();
    else if (this.accept("on")) expr = this.parseOn();
    else if (this.check("ordinal") || this.check("last")) expr = this.parseOrdinalRepeat();
    else throw this.expected("'every', 'on', or an ordinal (first, second, ...)");
    return scheduleData(expr, this.parseClauses());
  }

  private parseClauses(): Clauses {
    const clauses: Clauses = {};
    if (this.accept("except")) clauses.except = this.parseList(() => this.parseDateSpec("exception date"));
    if (this.accept("until")) clauses.until = this.parseDateSpec("until date");
    if (this.accept("starting")) {
      const tok = this.take("isoDate");
      if (!tok) throw this.expected("ISO date (YYYY-MM-DD) after 'starting'");
      if (!parseIsoDate(tok.date)) throw this.fail(`invalid starting date: ${tok.date}`, tok.span);
      clauses.anchor = tok.date;
    }
    if (this.accept("during")) clauses.during = this.parseList(() => this.parseMonthName());
    if (this.accept("in")) clauses.timezone = this.expectValue("timezone", "timezone after 'in'").zone;
    return clauses;
  }

  private parseList<T>(item: () => T): T[] {
    const items = [item()];
    while (this.accept("comma")) items.push(item());
    return items;
  }

  private parseEvery(): ScheduleExpr {
    const tok = this.peek();
    switch (tok?.kind) {
      case "year":
        this.pos++;
        return this.parseYearRepeat(1);
      case "day":
        return this.parseDayRepeat(1, { kind: "every" });
      case "weekday":
        this.pos++;
        return this.parseDayRepeat(1, { kind: "weekday" });
      case "weekend":
        this.pos++;
        return this.parseDayRepeat(1, { kind: "weekend" });
      case "dayName":
        return this.parseDayRepeat(1, { kind: "days", days: this.parseDayList() });
      case "month":
        this.pos++;
        return this.parseMonthRepeat(1);
      case "intervalUnit":
        return this.parseIntervalRepeat(1);
      case "number":
        return this.parseNumberRepeat();
      default:
        throw this.expected("day, weekday, weekend, year, day name, month, or number after 'every'");
    }
  }

  private parseInterval(): number {
    const tok = this.expectValue("number", "number");
    if (tok.value < 1) throw this.fail("interval must be at least 1", tok.span);
    return tok.value;
  }

  private parseNumberRepeat(): ScheduleExpr {
    const interval = this.parseInterval();
    switch (this.peek()?.kind) {
      case "weeks":
        this.pos++;
        return this.parseWeekRepeat(interval);
      case "intervalUnit":
        return this.parseIntervalRepeat(interval);
      case "day":
        return this.parseDayRepeat(interval, { kind: "every" });
      case "month":
        this.pos++;
        return this.parseMonthRepeat(interval);
      case "year":
        this.pos++;
        return this.parseYearRepeat(interval);
      default:
        throw this.expected("'weeks', 'min', 'minutes', 'hour', 'hours', 'day(s)', 'month(s)', or 'year(s)' after number");
    }
  }

  private parseDayRepeat(interval: number, days: DayFilter): ScheduleExpr {
    if (days.kind === "every") this.expect("day");
    this.expect("at");
    return { kind: "day", interval, days, times: this.parseTimeList() };
  }

  private parseIntervalRepeat(interval: number): ScheduleExpr {
    const unit = this.expectValue("intervalUnit", "'min' or 'hours'").unit;
    this.expect("from");
    const fromSpan = this.currentSpan();
    const from = this.parseTime();
    this.expect("to");
    const to = this.parseTime();
    if (from.hour * 60 + from.minute > to.hour * 60 + to.minute) {
      throw this.fail(`invalid window: ${formatTime(from)} to ${formatTime(to)}`, { start: fromSpan.start, end: this.tokens[this.pos - 1].span.end });
    }
    const dayFilter = this.accept("on") ? this.parseDayTarget() : null;
    return { kind: "interval", interval, unit, from, to, dayFilter };
  }

  private parseWeekRepeat(interval: number): ScheduleExpr {
    this.expect("on");
    const days = this.parseDayList();
    this.expect("at");
    return { kind: "week", interval, days, times: this.parseTimeList() };
  }

  private parseMonthRepeat(interval: number): ScheduleExpr {
    this.expect("on");
    this.expect("the");
    let target: MonthTarget;
    const tok = this.peek();
    switch (tok?.kind) {
      case "last":
        this.pos++;
        if (this.accept("day")) target = { kind: "lastDay" };
        else if (this.accept("weekday")) target = { kind: "lastWeekday" };
        else throw this.expected("'day' or 'weekday' after 'last'");
        break;
      case "ordinalNumber":
        target = { kind: "days", specs: this.parseList(() => this.parseOrdinalDaySpec()) };
        break;
      case "next":
      case "previous":
      case "nearest":
        target = this.parseNearestWeekdayTarget();
        break;
      default:
        throw this.expected("ordinal day (1st, 15th), 'last', or '[next|previous] nearest' after 'the'");
    }
    this.expect("at");
    return { kind: "month", interval, target, times: this.parseTimeList() };
  }

  private parseNearestWeekdayTarget(): MonthTarget {
    let direction: NearestDirection | null = null;
    if (this.accept("next")) direction = "next";
    else if (this.accept("previous")) direction = "previous";
    this.expect("nearest");
    this.expect("weekday");
    this.expect("to");
    const day = this.parseDayOfMonth("ordinal day number");
    return { kind: "nearestWeekday", day, direction };
  }

  private parseOrdinalDaySpec(): DayOfMonthSpec {
    const startTok = this.peek();
    const start = this.parseDayOfMonth("ordinal day number");
    if (!this.accept("to")) return { kind: "single", day: start };
    const end = this.parseDayOfMonth("ordinal day number after 'to'");
    if (start > end && startTok) {
      throw this.fail(`invalid range: ${ordinalNumber(start)} to ${ordinalNumber(end)}`, { start: startTok.span.start, end: this.tokens[this.pos - 1].span.end });
    }
    return { kind: "range", start, end };
  }

  private parseDayOfMonth(what: string): number {
    const tok = this.expectValue("ordinalNumber", what);
    return this.checkDayOfMonth(tok.value, tok.span);
  }

  private checkDayOfMonth(day: number, span: Span): number {
    if (day < 1 || day > 31) throw this.fail(`invalid day of month: ${day}`, span);
    return day;
  }

  private parseOrdinalRepeat(): ScheduleExpr {
    const ordinal = this.parseOrdinalPosition();
    const weekday = this.expectValue("dayName", "day name after ordinal").day;
    this.expect("of");
    this.expect("every");
    const interval = this.check("number") ? this.parseInterval() : 1;
    this.expect("month");
    this.expect("at");
    return { kind: "ordinal", interval, ordinal, weekday, times: this.parseTimeList() };
  }

  private parseOrdinalPosition(): OrdinalPosition {
    if (this.accept("last")) return "last";
    const tok = this.take("ordinal");
    if (!tok) throw this.expected("ordinal (first, second, third, fourth, fifth, last)");
    return tok.ordinal;
  }

  private parseYearRepeat(interval: number): ScheduleExpr {
    this.expect("on");
    let target: YearTarget;
    if (this.accept("the")) {
      target = this.parseYearTargetAfterThe();
    } else if (this.check("monthName")) {
      const { month, day } = this.parseNamedDate();
      target = { kind: "date", month, day };
    } else {
      throw this.expected("month name or 'the' after 'every year on'");
    }
    this.expect("at");
    return { kind: "year", interval, target, times: this.parseTimeList() };
  }

  private parseYearTargetAfterThe(): YearTarget {
    const tok = this.peek();
    if (tok?.kind === "last") {
      this.pos++;
      if (this.accept("weekday")) {
        this.expect("of");
        return { kind: "lastWeekday", month: this.parseMonthName() };
      }
      const weekday = this.take("dayName");
      if (!weekday) throw this.expected("'weekday' or day name after 'last' in yearly expression");
      this.expect("of");
      return { kind: "ordinalWeekday", ordinal: "last", weekday: weekday.day, month: this.parseMonthName() };
    }
    if (tok?.kind === "ordinal") {
      this.pos++;
      const weekday = this.expectValue("dayName", "day name after ordinal in yearly expression").day;
      this.expect("of");
      return { kind: "ordinalWeekday", ordinal: tok.ordinal, weekday, month: this.parseMonthName() };
    }
    if (tok?.kind === "ordinalNumber") {
      const day = this.parseDayOfMonth("day number");
      this.expect("of");
      const month = this.parseMonthName();
      if (day > daysInMonth(2000, monthNumber(month))) {
        throw this.fail(`invalid date: ${month} ${day}`, { start: tok.span.start, end: this.tokens[this.pos - 1].span.end });
      }
      return { kind: "dayOfMonth", day, month };
    }
    throw this.expected("ordinal, day number, or 'last' after 'the' in yearly expression");
  }

  private parseOn(): ScheduleExpr {
    const date = this.parseDateSpec("date");
    this.expect("at");
    return { kind: "singleDate", date, times: this.parseTimeList() };
  }

  /** ISO date or month name + day, used by single dates, except and until. */
  private parseDateSpec(what: string): DateSpec {
    const iso = this.take("isoDate");
    if (iso) {
      if (!parseIsoDate(iso.date)) throw this.fail(`invalid date: ${iso.date}`, iso.span);
      return { kind: "iso", date: iso.date };
    }
    if (this.check("monthName")) {
      const { month, day } = this.parseNamedDate();
      return { kind: "named", month, day };
    }
    throw this.expected(`${what} (ISO date or month name)`);
  }

  private parseNamedDate(): { month: MonthName; day: number } {
    const monthTok = this.expectValue("monthName", "month name");
    const tok = this.take("number") ?? this.take("ordinalNumber");
    if (!tok) throw this.expected("day number after month name");
    const day = this.checkDayOfMonth(tok.value, tok.span);
    // Leap years keep feb 29 reachable, so 2000 is the most permissive year.
    if (day > daysInMonth(2000, monthNumber(monthTok.month))) {
      throw this.fail(`invalid date: ${monthTok.month} ${day}`, { start: monthTok.span.start, end: tok.span.end });
    }
    return { month: monthTok.month, day };
  }

  private parseDayTarget(): DayFilter {
    if (this.accept("day")) return { kind: "every" };
    if (this.accept("weekday")) return { kind: "weekday" };
    if (this.accept("weekend")) return { kind: "weekend" };
    if (this.check("dayName")) return { kind: "days", days: this.parseDayList() };
    throw this.expected("'day', 'weekday', 'weekend', or day name");
  }

  private parseDayList(): Weekday[] {
    return this.parseList(() => this.expectValue("dayName", "day name").day);
  }

  private parseMonthName(): MonthName {
    return this.expectValue("monthName", "month name").month;
  }

  private parseTimeList(): TimeOfDay[] {
    return this.parseList(() => this.parseTime());
  }

  private parseTime(): TimeOfDay {
    const tok = this.take("time");
    if (tok) return { hour: tok.hour, minute: tok.minute };
    const bare = this.peek();
    if (isKind(bare, "number") && bare.value <= 23) {
      const fixed = `${String(bare.value).padStart(2, "0")}:00`;
      const suggestion = this.input.slice(0, bare.span.start) + fixed + this.input.slice(bare.span.end);
      throw this.fail(`expected time (HH:MM), got ${bare.value}`, bare.span, suggestion);
    }
    throw this.expected("time (HH:MM)");
  }
}

/** Parses an expression into an immutable `ScheduleData`. Throws a `ScheduleError` of kind lex or parse. */
export function parse(input: string): ScheduleData {
  const tokens = tokenize(input);
  const parser = new Parser(tokens, input);
  if (!tokens.length) throw parseError("empty expression", { start: 0, end: 0 }, input);
  const schedule = parser.parseExpression();
  parser.finish();
  return schedule;
}
