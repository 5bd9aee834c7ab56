import { describe, expect, test } from "vitest";
import { parse } from "../src/lang/parser.js";
import { display } from "../src/lang/display.js";

const canonical = [
  "every day at 09:00",
  "every weekday at 09:00, 17:30",
  "every weekend at 10:00",
  "every monday, wednesday at 08:15",
  "every 3 days at 09:00",
  "every 30 min from 09:00 to 17:00",
  "every 1 minute from 00:00 to 23:59",
  "every 2 hours from 08:00 to 20:00 on weekday",
  "every 2 weeks on monday, friday at 09:00",
  "every month on the 1st, 15th at 10:00",
  "every 2 months on the 1st to 5th at 10:00",
  "every month on the last day at 23:00",
  "every month on the last weekday at 17:00",
  "every month on the nearest weekday to 15th at 09:00",
  "every month on the next nearest weekday to 1st at 09:00",
  "first monday of every month at 10:00",
  "last friday of every 3 months at 16:00",
  "on 2026-03-15 at 14:30",
  "on feb 14 at 09:00",
  "every year on dec 25 at 00:00",
  "every 2 years on the first monday of sep at 09:00",
  "every year on the 15th of mar at 12:00",
  "every year on the last weekday of dec at 17:00",
  "every day at 09:00 except dec 25, 2026-01-01 until 2026-12-31 starting 2026-01-05 during jan, feb in Europe/London",
];

describe("display", () => {
  test.each(canonical)("canonical text renders unchanged: %s", (text) => {
    expect(display(parse(text))).toBe(text);
  });

  test("normalizes case, units and time padding", () => {
    expect(display(parse("Every Weekday at 9:00"))).toBe("every weekday at 09:00");
    expect(display(parse("every 30 minutes from 9:00 to 17:00"))).toBe("every 30 min from 09:00 to 17:00");
    expect(display(parse("every hour from 09:00 to 17:00"))).toBe("every 1 hour from 09:00 to 17:00");
    expect(display(parse("every year on the last sunday of march at 02:00"))).toBe("every year on the last sunday of mar at 02:00");
    expect(display(parse("every month on the 1ST at 10:00"))).toBe("every month on the 1st at 10:00");
  });

  test("ordinal suffixes", () => {
    expect(display(parse("every month on the 2nd, 3rd, 11th, 21st, 22nd, 23rd at 09:00"))).toBe(
      "every month on the 2nd, 3rd, 11th, 21st, 22nd, 23rd at 09:00",
    );
  });

  test("rendering is a fixed point", () => {
    const once = display(parse("every 2 weeks on tue, thu at 7:05 until dec 31 in Asia/Tokyo"));
    expect(once).toBe("every 2 weeks on tuesday, thursday at 07:05 until dec 31 in Asia/Tokyo");
    expect(display(parse(once))).toBe(once);
  });
});
