import os from "node:os";

export interface PlaybookConfig {
  historyPath: string;
  historySize: number;
  wrapWidth: number;
  logSteps: boolean;
  color: boolean;
}

export const DEFAULT_HISTORY_SIZE = 256;
export const DEFAULT_WRAP_WIDTH = 70;

type Env = Record<string, string | undefined>;

export function expandHome(p: string, home: string = os.homedir()): string {
  if (p === "~") return home;
  // keep the separator so "~/" still names the inside of home
  if (p.startsWith("~/")) return home + p.slice(1);
  return p;
}

function positiveInt(raw: string | undefined, fallback: number): number {
  const n = Number(raw);
  return raw && Number.isInteger(n) && n > 0 ? n : fallback;
}

export function loadConfig(env: Env = process.env, home: string = os.homedir()): PlaybookConfig {
  const quiet = env.QUIET === "1";
  return {
    historyPath: expandHome(env.PLAYBOOK_HISTORY || "~/.playbook_history", home),
    historySize: positiveInt(env.PLAYBOOK_HISTORY_SIZE, DEFAULT_HISTORY_SIZE),
    wrapWidth: positiveInt(env.PLAYBOOK_WRAP_WIDTH, DEFAULT_WRAP_WIDTH),
    logSteps: !quiet && (env.LOG_STEPS ?? "0") === "1",
    color: env.NO_COLOR === undefined,
  };
}
