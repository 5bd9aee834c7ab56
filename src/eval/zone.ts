import { Temporal } from "@js-temporal/polyfill";
import { evalError } from "../lang/error.js";
import type { TimeOfDay } from "../lang/ast.js";

const NS_PER_MS = 1_000_000;

/** An IANA zone resolved once; all evaluator date math goes through it. */
export class Zone {
  private constructor(readonly name: string) {}

  static readonly UTC = new Zone("UTC");

  /** Absent zone evaluates as UTC. Unknown names raise an eval error. */
  static resolve(name: string | null | undefined): Zone {
    if (!name || name === "UTC") return Zone.UTC;
    try {
      Temporal.Instant.fromEpochMilliseconds(0).toZonedDateTimeISO(name);
    } catch {
      throw evalError(`unknown timezone '${name}'`);
    }
    return new Zone(name);
  }

  private zoned(instant: Date): Temporal.ZonedDateTime {
    return Temporal.Instant.fromEpochMilliseconds(instant.getTime()).toZonedDateTimeISO(this.name);
  }

  wallClock(instant: Date): Temporal.PlainDateTime {
    return this.zoned(instant).toPlainDateTime();
  }

  dateOf(instant: Date): Temporal.PlainDate {
    return this.zoned(instant).toPlainDate();
  }

  minutesOf(instant: Date): number {
    const z = this.zoned(instant);
    return z.hour * 60 + z.minute;
  }

  /** Wall-clock time minus UTC at the given instant, in milliseconds. */
  offsetMs(instant: Date): number {
    return this.zoned(instant).offsetNanoseconds / NS_PER_MS;
  }

  /**
   * Resolves a wall-clock time on a date with "compatible" disambiguation:
   * times inside a spring-forward gap move forward by the gap size, times
   * inside a fall-back fold take the earlier instant.
   */
  atTime(date: Temporal.PlainDate, time: TimeOfDay): Date {
    const zoned = date
      .toPlainDateTime(Temporal.PlainTime.from({ hour: time.hour, minute: time.minute }))
      .toZonedDateTime(this.name, { disambiguation: "compatible" });
    return new Date(zoned.epochMilliseconds);
  }
}
