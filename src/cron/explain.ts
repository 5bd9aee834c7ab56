import { display } from "../lang/display.js";
import { fromCron } from "./bridge.js";

/** Canonical text for a cron expression, with a warning where `*\/N` does not divide the hour. */
export function explainCron(cron: string): string {
  const text = display(fromCron(cron));
  const step = /^\*\/(\d+)$/.exec(cron.trim().split(/\s+/)[0] ?? "");
  if (!step) return text;
  const n = Number(step[1]);
  if (60 % n === 0) return text;
  return `${text} (note: */${n} fires at :00, :${String(n).padStart(2, "0")}, ... and resets each hour)`;
}
