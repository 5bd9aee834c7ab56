import { Command, InvalidArgumentError } from "commander";
import chalk from "chalk";
import { loadConfig, getConfigPath } from "../config/loader.js";
import type { Config } from "../config/schema.js";
import { scheduleData } from "../lang/ast.js";
import { isScheduleError } from "../lang/error.js";
import { Zone } from "../eval/zone.js";
import { Schedule } from "../schedule.js";
import { explainCron } from "../cron/explain.js";
import { verifyCron } from "../cron/verify.js";

function parseCount(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n < 1) throw new InvalidArgumentError("must be a positive integer");
  return n;
}

function parseInstant(value: string): Date {
  const d = new Date(value);
  if (Number.isNaN(d.getTime())) throw new InvalidArgumentError(`invalid date '${value}'`);
  return d;
}

const pad = (n: number): string => String(n).padStart(2, "0");

export function formatInstant(instant: Date, schedule: Schedule, config: Config): string {
  if (config.defaults.format === "iso") return instant.toISOString();
  const zone = Zone.resolve(schedule.timezone);
  const w = zone.wallClock(instant);
  return `${w.toPlainDate().toString()} ${pad(w.hour)}:${pad(w.minute)} ${zone.name}`;
}

/** Parses an expression, applying the configured zone when it has no `in` clause. */
function load(input: string, config: Config): Schedule {
  const schedule = Schedule.parse(input);
  const tz = config.defaults.timezone;
  if (!tz || schedule.timezone) return schedule;
  const { expr, ...clauses } = schedule.expression;
  return Schedule.fromData(scheduleData(expr, { ...clauses, timezone: tz }));
}

export function buildProgram(config: Config = loadConfig()): Command {
  const paint = (fn: (text: string) => string, text: string): string => (config.cli.color ? fn(text) : text);

  const fail = (err: unknown): void => {
    const text = isScheduleError(err) ? err.displayRich() : String(err);
    console.log(paint(chalk.red, text));
    process.exitCode = 1;
  };

  // Command bodies report errors and set the exit code; none of them exits the process.
  const run = (fn: () => void): void => {
    try {
      fn();
    } catch (err) {
      fail(err);
    }
  };

  const program = new Command();
  program
    .name("cronspeak")
    .description("cronspeak - human-readable schedules with a cron bridge")
    .version("0.1.0", "-v, --version", "show version");

  program
    .command("next")
    .description("Show upcoming occurrences")
    .argument("<expr>", "schedule expression")
    .option("-n, --count <count>", "number of occurrences", parseCount)
    .option("--from <iso>", "start instant (default: now)", parseInstant)
    .option("--json", "print a JSON array", false)
    .action((expr: string, opts: { count?: number; from?: Date; json: boolean }) =>
      run(() => {
        const schedule = load(expr, config);
        const count = Math.min(opts.count ?? config.defaults.count, config.cli.maxCount);
        const hits = schedule.nextNFrom(opts.from ?? new Date(), count);
        if (opts.json) {
          console.log(JSON.stringify(hits.map((d) => d.toISOString())));
          return;
        }
        if (!hits.length) {
          console.log(paint(chalk.yellow, "No upcoming occurrences."));
          return;
        }
        for (const d of hits) console.log(formatInstant(d, schedule, config));
      }),
    );

  program
    .command("prev")
    .description("Show the most recent occurrence")
    .argument("<expr>", "schedule expression")
    .option("--from <iso>", "start instant (default: now)", parseInstant)
    .action((expr: string, opts: { from?: Date }) =>
      run(() => {
        const schedule = load(expr, config);
        const hit = schedule.previousFrom(opts.from ?? new Date());
        console.log(hit ? formatInstant(hit, schedule, config) : paint(chalk.yellow, "No previous occurrence."));
      }),
    );

  program
    .command("check")
    .description("Validate an expression and print its canonical form")
    .argument("<expr>", "schedule expression")
    .action((expr: string) =>
      run(() => {
        console.log(paint(chalk.green, Schedule.parse(expr).toString()));
      }),
    );

  program
    .command("parse")
    .description("Print the parsed expression as JSON")
    .argument("<expr>", "schedule expression")
    .action((expr: string) =>
      run(() => {
        console.log(JSON.stringify(Schedule.parse(expr).expression, null, 2));
      }),
    );

  program
    .command("to-cron")
    .description("Convert an expression to 5-field cron")
    .argument("<expr>", "schedule expression")
    .option("--verify", "cross-check the next runs with cron-parser", false)
    .option("--from <iso>", "start instant for --verify (default: now)", parseInstant)
    .action((expr: string, opts: { verify: boolean; from?: Date }) =>
      run(() => {
        const schedule = Schedule.parse(expr);
        if (!opts.verify) {
          console.log(schedule.toCron());
          return;
        }
        const result = verifyCron(schedule.expression, opts.from ?? new Date(), config.defaults.count);
        console.log(result.cron);
        if (result.agree) {
          console.log(paint(chalk.green, `cron-parser agrees on the next ${result.ours.length} runs`));
          return;
        }
        console.log(paint(chalk.red, "cron-parser disagrees:"));
        const rows = Math.max(result.ours.length, result.theirs.length);
        for (let i = 0; i < rows; i++) {
          console.log(`  ${result.ours[i]?.toISOString() ?? "-"}  ${result.theirs[i]?.toISOString() ?? "-"}`);
        }
        process.exitCode = 1;
      }),
    );

  program
    .command("from-cron")
    .description("Convert 5-field cron to an expression")
    .argument("<cron>", "cron expression (quoted)")
    .action((cron: string) =>
      run(() => {
        console.log(Schedule.fromCron(cron).toString());
      }),
    );

  program
    .command("explain")
    .description("Describe a cron expression in words")
    .argument("<cron>", "cron expression (quoted)")
    .action((cron: string) =>
      run(() => {
        console.log(explainCron(cron));
      }),
    );

  program
    .command("matches")
    .description("Test whether an instant is an occurrence")
    .argument("<expr>", "schedule expression")
    .argument("<iso>", "instant to test", parseInstant)
    .action((expr: string, instant: Date) =>
      run(() => {
        console.log(String(load(expr, config).matches(instant)));
      }),
    );

  program
    .command("config")
    .description("Show the config file path and effective values")
    .action(() => {
      console.log(`Config: ${getConfigPath()}`);
      console.log(JSON.stringify(config, null, 2));
    });

  return program;
}
