import { describe, expect, test } from "vitest";
import { parse } from "../src/lang/parser.js";
import { display } from "../src/lang/display.js";
import { fromCron, toCron } from "../src/cron/bridge.js";
import { explainCron } from "../src/cron/explain.js";
import { verifyCron } from "../src/cron/verify.js";
import { ScheduleError } from "../src/lang/error.js";

function cronFailure(fn: () => unknown): ScheduleError {
  try {
    fn();
  } catch (err) {
    if (err instanceof ScheduleError) return err;
    throw err;
  }
  throw new Error("expected a cron error");
}

const toCronCases: [string, string][] = [
  ["every day at 09:00", "0 9 * * *"],
  ["every weekday at 09:00", "0 9 * * 1-5"],
  ["every weekend at 10:30", "30 10 * * 0,6"],
  ["every monday, sunday at 08:30", "30 8 * * 0,1"],
  ["every 15 min from 00:00 to 23:59", "*/15 * * * *"],
  ["every 30 min from 00:00 to 23:59 on weekday", "*/30 * * * 1-5"],
  ["every 2 hours from 00:00 to 23:59", "0 */2 * * *"],
  ["every month on the 1st, 15th at 10:00", "0 10 1,15 * *"],
  ["every month on the 1st to 3rd at 10:00", "0 10 1,2,3 * *"],
  ["every month on the nearest weekday to 15th at 09:00", "0 9 15W * *"],
  ["every monday, tuesday, wednesday, thursday, friday at 09:00", "0 9 * * 1-5"],
  ["every saturday, sunday at 10:00", "0 10 * * 0,6"],
  ["every monday, monday at 09:00", "0 9 * * 1"],
  ["every 30 min from 00:00 to 23:59 on friday, monday, wednesday, tuesday, thursday", "*/30 * * * 1-5"],
];

describe("toCron", () => {
  test.each(toCronCases)("%s -> %s", (text, cron) => {
    expect(toCron(parse(text))).toBe(cron);
  });

  test.each(toCronCases)("cron for %s survives fromCron", (text) => {
    const cron = toCron(parse(text));
    expect(toCron(fromCron(cron))).toBe(cron);
  });

  test.each([
    ["every day at 09:00 except dec 25", "not expressible as cron (except clauses not supported)"],
    ["every day at 09:00 until 2026-12-31", "not expressible as cron (until clauses not supported)"],
    ["every day at 09:00 during jan", "not expressible as cron (during clauses not supported)"],
    ["every 3 days at 09:00", "not expressible as cron (multi-day intervals not supported)"],
    ["every day at 09:00, 17:00", "not expressible as cron (multiple times not supported)"],
    ["every 7 min from 00:00 to 23:59", "not expressible as cron (*/7 breaks at hour boundaries)"],
    ["every 15 min from 09:00 to 17:00", "not expressible as cron (partial-day interval windows not supported)"],
    ["every 2 weeks on monday at 09:00", "not expressible as cron (multi-week intervals not supported)"],
    ["every 2 months on the 1st at 09:00", "not expressible as cron (multi-month intervals not supported)"],
    ["every month on the last day at 23:00", "not expressible as cron (last day of month not supported)"],
    ["every month on the last weekday at 23:00", "not expressible as cron (last weekday of month not supported)"],
    ["every month on the next nearest weekday to 15th at 09:00", "not expressible as cron (next nearest weekday not supported)"],
    ["first monday of every month at 10:00", "not expressible as cron (ordinal weekday of month not supported)"],
    ["on 2026-03-15 at 09:00", "not expressible as cron (single dates are not repeating)"],
    ["every year on dec 25 at 00:00", "not expressible as cron (yearly schedules not supported in 5-field cron)"],
  ])("%s is refused", (text, message) => {
    const err = cronFailure(() => toCron(parse(text)));
    expect(err.kind).toBe("cron");
    expect(err.message).toBe(message);
  });
});

describe("fromCron", () => {
  test("weekday range equals the weekday expression", () => {
    expect(fromCron("0 9 * * 1-5")).toEqual(parse("every weekday at 09:00"));
  });

  test.each([
    ["30 8 * * 6,0", "every weekend at 08:30"],
    ["0 9 * * MON-FRI", "every weekday at 09:00"],
    ["0 9 ? * mon", "every monday at 09:00"],
    ["0 9 * * 7", "every sunday at 09:00"],
    ["0 9 * * */2", "every sunday, tuesday, thursday, saturday at 09:00"],
    ["0 9,17 * * *", "every day at 09:00, 17:00"],
    ["0 12 1,15 * *", "every month on the 1st, 15th at 12:00"],
    ["0 12 1-5 * *", "every month on the 1st to 5th at 12:00"],
    ["0 9 */10 * *", "every month on the 1st, 11th, 21st, 31st at 09:00"],
    ["0 0 L * *", "every month on the last day at 00:00"],
    ["0 17 LW * *", "every month on the last weekday at 17:00"],
    ["0 9 15W * *", "every month on the nearest weekday to 15th at 09:00"],
    ["0 10 * * 1#1", "first monday of every month at 10:00"],
    ["0 16 * * 5L", "last friday of every month at 16:00"],
    ["*/15 * * * *", "every 15 min from 00:00 to 23:59"],
    ["*/15 9-17 * * 1-5", "every 15 min from 09:00 to 17:59 on weekday"],
    ["*/10 9 * * *", "every 10 min from 09:00 to 09:59"],
    ["0-30/10 9 * * *", "every 10 min from 09:00 to 09:30"],
    ["0 */2 * * *", "every 2 hours from 00:00 to 23:59"],
    ["0 9-17/4 * * *", "every 4 hours from 09:00 to 17:00"],
    ["0 9 * 1-3 *", "every day at 09:00 during jan, feb, mar"],
    ["0 9 * jun,dec *", "every day at 09:00 during jun, dec"],
    ["@daily", "every day at 00:00"],
    ["@weekly", "every sunday at 00:00"],
    ["@monthly", "every month on the 1st at 00:00"],
    ["@yearly", "every year on jan 1 at 00:00"],
    ["@hourly", "every 1 hour from 00:00 to 23:59"],
  ])("%s -> %s", (cron, text) => {
    expect(display(fromCron(cron))).toBe(text);
  });

  test.each([
    ["0 9 * *", "expected 5 cron fields, got 4"],
    ["60 9 * * *", "minute must be 0-59, got 60"],
    ["0 24 * * *", "hour must be 0-23, got 24"],
    ["0 9 * 13 *", "month must be 1-12, got 13"],
    ["0 9 32 * *", "DOM must be 1-31, got 32"],
    ["0 9 * * 8", "DOW must be 0-7, got 8"],
    ["0 9 * * 5-1", "range start must be <= end: 5-1"],
    ["*/0 * * * *", "step cannot be 0"],
    ["@reboot", "unknown @ shortcut: @reboot"],
    ["0 9 1,15W * *", "W needs a single day of month: 1,15W"],
    ["0 9 * * 1#6", "nth must be 1-5, got 6"],
    ["0 9 15 * 1", "DOM and DOW together not supported"],
    ["0-30/10 9-17 * * *", "minute ranges with steps need a single hour: 0-30/10"],
  ])("%s is rejected", (cron, message) => {
    const err = cronFailure(() => fromCron(cron));
    expect(err.kind).toBe("cron");
    expect(err.message).toBe(message);
  });

  test.each([
    "0 9 * * *",
    "30 8 * * 1-5",
    "0 10 * * 0,6",
    "15 7 * * 1,3,5",
    "*/15 * * * *",
    "*/5 * * * 1-5",
    "0 */3 * * *",
    "0 */2 * * 0,6",
    "0 12 1,15 * *",
    "0 9 15W * *",
  ])("round-trips %s", (cron) => {
    expect(toCron(fromCron(cron))).toBe(cron);
  });
});

describe("explainCron", () => {
  test("plain description", () => {
    expect(explainCron("0 9 * * 1-5")).toBe("every weekday at 09:00");
  });

  test("notes steps that do not divide the hour", () => {
    expect(explainCron("*/7 * * * *")).toBe("every 7 min from 00:00 to 23:59 (note: */7 fires at :00, :07, ... and resets each hour)");
  });
});

describe("verifyCron", () => {
  const from = new Date("2026-03-06T00:07:30Z");

  test.each([
    "every weekday at 09:00",
    "every 15 min from 00:00 to 23:59",
    "every month on the 1st, 15th at 10:00",
    "every day at 09:00 in America/New_York",
  ])("cron-parser agrees on %s", (text) => {
    const result = verifyCron(parse(text), from, 5);
    expect(result.ours).toHaveLength(5);
    expect(result.ours.map((d) => d.toISOString())).toEqual(result.theirs.map((d) => d.toISOString()));
    expect(result.agree).toBe(true);
  });

  test("schedules without a cron form are refused before cron-parser runs", () => {
    expect(() => verifyCron(parse("every 2 weeks on monday at 09:00"), from, 3)).toThrow("multi-week intervals not supported");
  });
});
