import fs from "node:fs";
import path from "node:path";
import os from "node:os";

export function ensureDir(dir: string): string {
  fs.mkdirSync(dir, { recursive: true });
  return dir;
}

export function getDataPath(): string {
  return path.join(os.homedir(), ".cronspeak");
}

/** Expands a leading `~` to the home directory. */
export function expandHome(p: string): string {
  return p.replace(/^~(?=$|[\\/])/, os.homedir());
}
