import parser from "cron-parser";
import type { ScheduleData } from "../lang/ast.js";
import { cronError } from "../lang/error.js";
import { nextNFrom } from "../eval/evaluator.js";
import { toCron } from "./bridge.js";

export interface CronVerification {
  cron: string;
  agree: boolean;
  ours: Date[];
  theirs: Date[];
}

function cronRuns(cron: string, from: Date, count: number, tz: string): Date[] {
  try {
    const it = parser.parseExpression(cron, { currentDate: from, tz });
    return Array.from({ length: count }, () => it.next().toDate());
  } catch (err) {
    throw cronError(`cron-parser rejected '${cron}': ${err instanceof Error ? err.message : String(err)}`);
  }
}

/** Cross-checks the evaluator against cron-parser for the cron form of a schedule. */
export function verifyCron(schedule: ScheduleData, from: Date, count: number): CronVerification {
  const cron = toCron(schedule);
  const ours = nextNFrom(schedule, from, count);
  const theirs = cronRuns(cron, from, count, schedule.timezone ?? "UTC");
  const agree = ours.length === theirs.length && ours.every((t, i) => t.getTime() === theirs[i].getTime());
  return { cron, agree, ours, theirs };
}
