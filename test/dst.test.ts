import { describe, expect, test } from "vitest";
import { parse } from "../src/lang/parser.js";
import { matches, nextFrom, nextNFrom, previousFrom } from "../src/eval/evaluator.js";
import { Zone } from "../src/eval/zone.js";
import { ScheduleError } from "../src/lang/error.js";

const at = (iso: string): Date => new Date(iso);
const iso = (dates: Date[]): string[] => dates.map((d) => d.toISOString());

describe("spring-forward gap (America/New_York, 2026-03-08)", () => {
  const s = parse("every day at 02:30 in America/New_York");

  test("a time inside the gap moves forward by the gap size", () => {
    expect(nextFrom(s, at("2026-03-07T12:00:00Z"))?.toISOString()).toBe("2026-03-08T07:30:00.000Z");
  });

  test("neighbouring days keep 02:30 local", () => {
    expect(iso(nextNFrom(s, at("2026-03-07T00:00:00Z"), 3))).toEqual([
      "2026-03-07T07:30:00.000Z",
      "2026-03-08T07:30:00.000Z",
      "2026-03-09T06:30:00.000Z",
    ]);
  });

  test("previousFrom and matches agree with the shifted instant", () => {
    expect(previousFrom(s, at("2026-03-08T12:00:00Z"))?.toISOString()).toBe("2026-03-08T07:30:00.000Z");
    expect(matches(s, at("2026-03-08T07:30:00Z"))).toBe(true);
  });

  test("interval slots collapse onto the same instants", () => {
    const window = parse("every 30 min from 01:00 to 04:00 in America/New_York");
    expect(iso(nextNFrom(window, at("2026-03-08T05:59:00Z"), 5))).toEqual([
      "2026-03-08T06:00:00.000Z",
      "2026-03-08T06:30:00.000Z",
      "2026-03-08T07:00:00.000Z",
      "2026-03-08T07:30:00.000Z",
      "2026-03-08T08:00:00.000Z",
    ]);
  });
});

describe("fall-back fold (America/New_York, 2026-11-01)", () => {
  test("an ambiguous time fires once, at the earlier instant", () => {
    const s = parse("every day at 01:30 in America/New_York");
    expect(iso(nextNFrom(s, at("2026-10-31T12:00:00Z"), 2))).toEqual(["2026-11-01T05:30:00.000Z", "2026-11-02T06:30:00.000Z"]);
  });
});

describe("zones", () => {
  test("summer time offset is applied", () => {
    expect(nextFrom(parse("every day at 09:00 in Europe/London"), at("2026-07-01T00:00:00Z"))?.toISOString()).toBe("2026-07-01T08:00:00.000Z");
  });

  test("dates are taken in the schedule's zone", () => {
    // 2026-02-07T03:00Z is still Friday evening in Los Angeles.
    const s = parse("every weekday at 20:00 in America/Los_Angeles");
    expect(nextFrom(s, at("2026-02-07T03:00:00Z"))?.toISOString()).toBe("2026-02-07T04:00:00.000Z");
  });

  test("wall clock and offsets", () => {
    const ny = Zone.resolve("America/New_York");
    expect(ny.wallClock(at("2026-03-08T07:30:00Z")).toString()).toBe("2026-03-08T03:30:00");
    expect(ny.offsetMs(at("2026-01-15T12:00:00Z"))).toBe(-5 * 3600 * 1000);
    expect(ny.offsetMs(at("2026-07-15T12:00:00Z"))).toBe(-4 * 3600 * 1000);
  });

  test("absent zone is UTC", () => {
    expect(Zone.resolve(null)).toBe(Zone.UTC);
    expect(Zone.resolve(undefined).name).toBe("UTC");
  });

  test("unknown zone is an eval error", () => {
    expect(() => Zone.resolve("Mars/Olympus_Mons")).toThrow(ScheduleError);
    expect(() => Zone.resolve("Mars/Olympus_Mons")).toThrow("unknown timezone 'Mars/Olympus_Mons'");
  });
});
