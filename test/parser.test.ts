import { describe, expect, test } from "vitest";
import { parse } from "../src/lang/parser.js";
import { scheduleData } from "../src/lang/ast.js";
import { ScheduleError } from "../src/lang/error.js";

function parseFailure(input: string): ScheduleError {
  try {
    parse(input);
  } catch (err) {
    if (err instanceof ScheduleError) return err;
    throw err;
  }
  throw new Error(`expected '${input}' to fail`);
}

const nine = { hour: 9, minute: 0 };

describe("parse day and interval repeats", () => {
  test("weekday", () => {
    expect(parse("every weekday at 09:00")).toEqual(
      scheduleData({ kind: "day", interval: 1, days: { kind: "weekday" }, times: [nine] }),
    );
  });

  test("day list and multiple times", () => {
    expect(parse("every monday, friday at 09:00, 17:30").expr).toEqual({
      kind: "day",
      interval: 1,
      days: { kind: "days", days: ["monday", "friday"] },
      times: [nine, { hour: 17, minute: 30 }],
    });
  });

  test("every N days", () => {
    expect(parse("every 3 days at 09:00").expr).toEqual({ kind: "day", interval: 3, days: { kind: "every" }, times: [nine] });
  });

  test("interval window with day filter", () => {
    expect(parse("every 30 min from 09:00 to 17:00 on weekday").expr).toEqual({
      kind: "interval",
      interval: 30,
      unit: "min",
      from: nine,
      to: { hour: 17, minute: 0 },
      dayFilter: { kind: "weekday" },
    });
  });

  test("interval without a number defaults to 1", () => {
    expect(parse("every hour from 08:00 to 12:00").expr).toMatchObject({ kind: "interval", interval: 1, unit: "hours", dayFilter: null });
  });

  test("week repeat", () => {
    expect(parse("every 2 weeks on monday, thursday at 09:00").expr).toEqual({
      kind: "week",
      interval: 2,
      days: ["monday", "thursday"],
      times: [nine],
    });
  });
});

describe("parse month, ordinal and year repeats", () => {
  test("day list with a range", () => {
    expect(parse("every month on the 1st, 10th to 12th at 09:00").expr).toEqual({
      kind: "month",
      interval: 1,
      target: { kind: "days", specs: [{ kind: "single", day: 1 }, { kind: "range", start: 10, end: 12 }] },
      times: [nine],
    });
  });

  test("last day and last weekday", () => {
    expect(parse("every month on the last day at 23:00").expr).toMatchObject({ target: { kind: "lastDay" } });
    expect(parse("every 2 months on the last weekday at 17:00").expr).toMatchObject({ interval: 2, target: { kind: "lastWeekday" } });
  });

  test("nearest weekday with and without direction", () => {
    expect(parse("every month on the nearest weekday to 15th at 09:00").expr).toMatchObject({
      target: { kind: "nearestWeekday", day: 15, direction: null },
    });
    expect(parse("every month on the previous nearest weekday to 1st at 09:00").expr).toMatchObject({
      target: { kind: "nearestWeekday", day: 1, direction: "previous" },
    });
  });

  test("ordinal weekday of every N months", () => {
    expect(parse("last friday of every month at 16:00").expr).toEqual({
      kind: "ordinal",
      interval: 1,
      ordinal: "last",
      weekday: "friday",
      times: [{ hour: 16, minute: 0 }],
    });
    expect(parse("second tuesday of every 3 months at 09:00").expr).toMatchObject({ interval: 3, ordinal: "second", weekday: "tuesday" });
  });

  test("year targets", () => {
    expect(parse("every year on dec 25 at 00:00").expr).toMatchObject({ kind: "year", target: { kind: "date", month: "dec", day: 25 } });
    expect(parse("every 2 years on the first monday of sep at 09:00").expr).toMatchObject({
      interval: 2,
      target: { kind: "ordinalWeekday", ordinal: "first", weekday: "monday", month: "sep" },
    });
    expect(parse("every year on the 15th of march at 12:00").expr).toMatchObject({ target: { kind: "dayOfMonth", day: 15, month: "mar" } });
    expect(parse("every year on the last weekday of dec at 17:00").expr).toMatchObject({ target: { kind: "lastWeekday", month: "dec" } });
  });

  test("single dates", () => {
    expect(parse("on 2026-03-15 at 14:30").expr).toEqual({
      kind: "singleDate",
      date: { kind: "iso", date: "2026-03-15" },
      times: [{ hour: 14, minute: 30 }],
    });
    expect(parse("on feb 29 at 09:00").expr).toMatchObject({ date: { kind: "named", month: "feb", day: 29 } });
  });
});

describe("clauses", () => {
  test("all clauses in order", () => {
    const s = parse("every day at 09:00 except dec 25, 2026-01-01 until 2026-12-31 starting 2026-01-05 during jan, feb in Europe/London");
    expect(s.except).toEqual([{ kind: "named", month: "dec", day: 25 }, { kind: "iso", date: "2026-01-01" }]);
    expect(s.until).toEqual({ kind: "iso", date: "2026-12-31" });
    expect(s.anchor).toBe("2026-01-05");
    expect(s.during).toEqual(["jan", "feb"]);
    expect(s.timezone).toBe("Europe/London");
  });

  test("result is deeply frozen", () => {
    const s = parse("every monday at 09:00 except dec 25");
    expect(Object.isFrozen(s)).toBe(true);
    expect(Object.isFrozen(s.expr)).toBe(true);
    expect(Object.isFrozen(s.except)).toBe(true);
    expect(Object.isFrozen(s.except[0])).toBe(true);
  });
});

describe("parse errors", () => {
  test("empty expression", () => {
    const err = parseFailure("");
    expect(err.kind).toBe("parse");
    expect(err.message).toBe("empty expression");
  });

  test("zero interval", () => {
    const err = parseFailure("every 0 days at 09:00");
    expect(err.message).toBe("interval must be at least 1");
    expect(err.span).toEqual({ start: 6, end: 7 });
  });

  test("bare hour suggests HH:00", () => {
    const err = parseFailure("every day at 9");
    expect(err.message).toBe("expected time (HH:MM), got 9");
    expect(err.span).toEqual({ start: 13, end: 14 });
    expect(err.suggestion).toBe("every day at 09:00");
  });

  test("missing 'at' at end of input", () => {
    const err = parseFailure("every day");
    expect(err.message).toBe("expected 'at'");
    expect(err.span).toEqual({ start: 9, end: 9 });
  });

  test("unexpected token names what it got", () => {
    expect(parseFailure("every at 09:00").message).toBe(
      "expected day, weekday, weekend, year, day name, month, or number after 'every', got 'at'",
    );
  });

  test("calendar validation", () => {
    expect(parseFailure("every month on the 32nd at 09:00").message).toBe("invalid day of month: 32");
    expect(parseFailure("on feb 30 at 09:00").message).toBe("invalid date: feb 30");
    expect(parseFailure("on 2026-02-30 at 09:00").message).toBe("invalid date: 2026-02-30");
    expect(parseFailure("every year on the 31st of apr at 09:00").message).toBe("invalid date: apr 31");
    expect(parseFailure("every day at 09:00 starting 2026-13-01").message).toBe("invalid starting date: 2026-13-01");
  });

  test("reversed ranges and windows", () => {
    expect(parseFailure("every month on the 10th to 5th at 09:00").message).toBe("invalid range: 10th to 5th");
    const err = parseFailure("every 30 min from 17:00 to 09:00");
    expect(err.message).toBe("invalid window: 17:00 to 09:00");
    expect(err.span).toEqual({ start: 18, end: 32 });
  });

  test("trailing tokens", () => {
    const err = parseFailure("every day at 09:00 at");
    expect(err.message).toBe("unexpected tokens after expression");
    expect(err.span).toEqual({ start: 19, end: 21 });
  });

  test("missing timezone", () => {
    expect(parseFailure("every day at 09:00 in").message).toBe("expected timezone after 'in'");
  });
});
