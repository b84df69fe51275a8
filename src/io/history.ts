import { existsSync, mkdirSync, readFileSync, writeFileSync } from "node:fs";
import { dirname } from "node:path";
import { DEFAULT_HISTORY_SIZE } from "../config.js";

// One entry per line, oldest first.

export function loadHistory(path: string, size: number = DEFAULT_HISTORY_SIZE): string[] {
  if (!existsSync(path)) return [];
  const entries = readFileSync(path, "utf-8").split("\n").filter(l => l.length > 0);
  return entries.slice(-size);
}

export function saveHistory(path: string, entries: readonly string[], size: number = DEFAULT_HISTORY_SIZE): string {
  mkdirSync(dirname(path), { recursive: true });
  const kept = entries.slice(-size);
  writeFileSync(path, kept.length ? kept.join("\n") + "\n" : "", "utf-8");
  return path;
}
