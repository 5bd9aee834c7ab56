import fs from "node:fs";
import path from "node:path";
import { DEFAULT_CONFIG, type Config } from "./schema.js";
import { ensureDir, expandHome, getDataPath } from "../utils/helpers.js";

export function getConfigPath(): string {
  const override = process.env.CRONSPEAK_CONFIG;
  return override ? path.resolve(expandHome(override)) : path.join(getDataPath(), "config.json");
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return !!value && typeof value === "object" && !Array.isArray(value);
}

function deepMerge(base: Record<string, unknown>, patch: unknown): Record<string, unknown> {
  if (!isRecord(patch)) return base;
  const out: Record<string, unknown> = { ...base };
  for (const [k, v] of Object.entries(patch)) {
    const current = out[k];
    out[k] = isRecord(v) && isRecord(current) ? deepMerge(current, v) : v;
  }
  return out;
}

function section(value: unknown, name: string): Record<string, unknown> {
  if (!isRecord(value)) throw new Error(`${name} must be an object`);
  return value;
}

function positiveInt(value: unknown, name: string): number {
  if (typeof value !== "number" || !Number.isInteger(value) || value < 1) throw new Error(`${name} must be a positive integer`);
  return value;
}

function toConfig(data: Record<string, unknown>): Config {
  const defaults = section(data.defaults, "defaults");
  const cli = section(data.cli, "cli");
  const { timezone, format, count } = defaults;
  if (timezone !== null && typeof timezone !== "string") throw new Error("defaults.timezone must be a string or null");
  if (format !== "iso" && format !== "local") throw new Error('defaults.format must be "iso" or "local"');
  const { color, maxCount } = cli;
  if (typeof color !== "boolean") throw new Error("cli.color must be a boolean");
  return {
    defaults: { timezone, format, count: positiveInt(count, "defaults.count") },
    cli: { color, maxCount: positiveInt(maxCount, "cli.maxCount") },
  };
}

/** Environment overrides, applied after the file. */
function applyEnv(config: Config): Config {
  const tz = process.env.CRONSPEAK_TZ;
  if (tz) config.defaults.timezone = tz;
  return config;
}

export function loadConfig(configPath?: string): Config {
  const p = configPath ?? getConfigPath();
  if (!fs.existsSync(p)) return applyEnv(structuredClone(DEFAULT_CONFIG));

  try {
    const raw = fs.readFileSync(p, "utf8");
    const merged = deepMerge(structuredClone(DEFAULT_CONFIG), JSON.parse(raw));
    return applyEnv(toConfig(merged));
  } catch (err) {
    console.warn(`Warning: Failed to load config from ${p}: ${String(err)}`);
    return applyEnv(structuredClone(DEFAULT_CONFIG));
  }
}

export function saveConfig(config: Config, configPath?: string): void {
  const p = configPath ?? getConfigPath();
  ensureDir(path.dirname(p));
  fs.writeFileSync(p, JSON.stringify(config, null, 2), "utf8");
}
