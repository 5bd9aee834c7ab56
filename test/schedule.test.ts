import { describe, expect, test } from "vitest";
import { Schedule } from "../src/schedule.js";
import { validate } from "../src/lib.js";
import { ScheduleError } from "../src/lang/error.js";

const iso = (d: Date | null): string | null => d?.toISOString() ?? null;

describe("Schedule", () => {
  test("parses and renders canonical text", () => {
    const schedule = Schedule.parse("Every Weekday At 9:00");
    expect(schedule.toString()).toBe("every weekday at 09:00");
    expect(schedule.timezone).toBeUndefined();
  });

  test("evaluates in its own zone", () => {
    const schedule = Schedule.parse("every day at 09:00 in Europe/London");
    expect(schedule.timezone).toBe("Europe/London");
    expect(iso(schedule.nextFrom(new Date("2026-07-01T00:00:00Z")))).toBe("2026-07-01T08:00:00.000Z");
    expect(iso(schedule.previousFrom(new Date("2026-07-01T00:00:00Z")))).toBe("2026-06-30T08:00:00.000Z");
    expect(schedule.matches(new Date("2026-07-01T08:00:00Z"))).toBe(true);
    expect(schedule.matches(new Date("2026-07-01T09:00:00Z"))).toBe(false);
  });

  test("nextNFrom and between", () => {
    const schedule = Schedule.parse("every day at 09:00");
    expect(schedule.nextNFrom(new Date("2026-02-06T12:00:00Z"), 2).map((d) => d.toISOString())).toEqual([
      "2026-02-07T09:00:00.000Z",
      "2026-02-08T09:00:00.000Z",
    ]);
    const hits = [...schedule.between(new Date("2026-02-06T09:00:00Z"), new Date("2026-02-08T09:00:00Z"))];
    expect(hits.map((d) => d.toISOString())).toEqual(["2026-02-07T09:00:00.000Z", "2026-02-08T09:00:00.000Z"]);
  });

  test("occurrences is lazy over an unbounded schedule", () => {
    const it = Schedule.parse("every 30 min from 00:00 to 23:59").occurrences(new Date("2026-02-06T00:10:00Z"));
    const first = it.next();
    expect(first.done ? null : first.value.toISOString()).toBe("2026-02-06T00:30:00.000Z");
  });

  test("cron conversion both ways", () => {
    expect(Schedule.parse("every weekday at 09:00").toCron()).toBe("0 9 * * 1-5");
    expect(Schedule.fromCron("0 9 * * 1-5").toString()).toBe("every weekday at 09:00");
  });

  test("withAnchor returns a new schedule", () => {
    const base = Schedule.parse("every 2 weeks on monday at 09:00");
    const anchored = base.withAnchor("2026-02-09");
    expect(base.toString()).toBe("every 2 weeks on monday at 09:00");
    expect(anchored.toString()).toBe("every 2 weeks on monday at 09:00 starting 2026-02-09");
    expect(iso(anchored.nextFrom(new Date("2026-02-10T00:00:00Z")))).toBe("2026-02-23T09:00:00.000Z");
  });

  test("withAnchor rejects an invalid date", () => {
    expect(() => Schedule.parse("every day at 09:00").withAnchor("2026-02-30")).toThrow("invalid starting date: 2026-02-30");
  });

  test("unknown zone fails at construction with an eval error", () => {
    let caught: unknown;
    try {
      Schedule.parse("every day at 09:00 in Mars/Olympus");
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(ScheduleError);
    expect(caught instanceof ScheduleError ? caught.kind : null).toBe("eval");
    expect(caught instanceof ScheduleError ? caught.message : null).toBe("unknown timezone 'Mars/Olympus'");
  });

  test("validate", () => {
    expect(Schedule.validate("every day at 09:00")).toBe(true);
    expect(validate("every day at 9")).toBe(false);
    expect(validate("every day at 09:00 in Mars/Olympus")).toBe(false);
  });
});
