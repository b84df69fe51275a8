// src/runner.ts
// Command-line runner:
// - PLAYBOOK is <module>:<export>; a bare <module> means its default export
// - relative or absolute modules resolve against -L LOADPATH (default: cwd), others import as packages
// - the export may be a Step instance or a Step subclass that takes no arguments
// - operator input history is loaded before the first prompt and saved when the process exits
import path from 'node:path';
import { pathToFileURL } from 'node:url';
import { loadConfig, type PlaybookConfig } from './config.js';
import { createError, formatError } from './errors.js';
import { loadHistory, saveHistory } from './io/history.js';
import { ReadlineEditor } from './io/lineEditor.js';
import { Step } from './orchestrator/step.js';
import { runPlaybook } from './orchestrator/run.js';
import { ConsoleRenderer } from './prompt/renderer.js';

export const USAGE = 'Usage: playbook [-L LOADPATH] PLAYBOOK\n\n' +
  '  PLAYBOOK   <module>:<export> naming a Step instance or a Step subclass\n' +
  '  -L         directory that relative modules are resolved against';

export interface CliArgs {
  loadPath?: string;
  playbook?: string;
  help: boolean;
}

export function parseArgs(argv: string[]): CliArgs {
  const out: CliArgs = { help: false };
  for (let i = 2; i < argv.length; i++) {
    const a = argv[i];
    const next = () => argv[i+1];
    if (a === '-h' || a === '--help') out.help = true;
    else if (a === '-L' || a === '--load-path') {
      if (next() === undefined) throw createError('INVALID_ARGUMENT', `${a} requires a directory`);
      out.loadPath = argv[++i];
    }
    else if (a.startsWith('-L') && a.length > 2) out.loadPath = a.slice(2);
    else if (a.startsWith('--load-path=')) out.loadPath = a.slice('--load-path='.length);
    else if (a.startsWith('-')) throw createError('INVALID_ARGUMENT', `unknown option ${a}`);
    else if (out.playbook === undefined) out.playbook = a;
    else throw createError('INVALID_ARGUMENT', `unexpected argument ${a}`);
  }
  return out;
}

export function parseSpecifier(spec: string): { module: string; exportName: string } {
  const ix = spec.lastIndexOf(':');
  if (ix <= 0) return { module: spec, exportName: 'default' };
  return { module: spec.slice(0, ix), exportName: spec.slice(ix + 1) || 'default' };
}

export function resolveModule(module: string, loadPath: string = process.cwd()): string {
  if (module.startsWith('.') || path.isAbsolute(module)) {
    return pathToFileURL(path.resolve(loadPath, module)).href;
  }
  return module;
}

function isStepClass(value: unknown): value is new () => Step {
  return typeof value === 'function' && value.prototype instanceof Step;
}

export function toStep(value: unknown, spec: string): Step {
  if (value instanceof Step) return value;
  if (isStepClass(value)) return new value();
  throw createError('NOT_A_PLAYBOOK', `The expression ${spec} doesn't evaluate to a playbook.\nCannot continue; exiting.`, { spec });
}

export async function loadPlaybook(spec: string, loadPath?: string): Promise<Step> {
  const { module, exportName } = parseSpecifier(spec);
  const target = resolveModule(module, loadPath);
  let mod: Record<string, unknown>;
  try {
    mod = await import(target);
  } catch (e: unknown) {
    const reason = e instanceof Error ? e.message : String(e);
    throw createError('LOAD_FAILED', `Failed to load ${module}: ${reason}`, { module: target });
  }
  return toStep(mod[exportName], spec);
}

/** Save operator history, reporting rather than throwing: this runs inside the 'exit' handler. */
export function persistHistory(
  config: PlaybookConfig,
  entries: readonly string[],
  report: (message: string) => void = (message) => console.error(message),
): boolean {
  try {
    saveHistory(config.historyPath, entries, config.historySize);
    return true;
  } catch (e: unknown) {
    report(formatError(e));
    return false;
  }
}

export async function runPlaybookFile(spec: string, loadPath: string | undefined, config: PlaybookConfig) {
  const step = await loadPlaybook(spec, loadPath);

  const editor = new ReadlineEditor({
    history: loadHistory(config.historyPath, config.historySize),
    historySize: config.historySize,
  });
  // 'exit' also fires on the halt path, which leaves through process.exit
  process.on('exit', () => {
    persistHistory(config, editor.history());
  });

  try {
    await runPlaybook(step, {
      editor,
      renderer: new ConsoleRenderer(config.wrapWidth),
      logSteps: config.logSteps,
      color: config.color,
    });
  } finally {
    editor.close();
  }
}

export async function main(argv: string[], env: Record<string, string | undefined> = process.env) {
  const { playbook, loadPath, help } = parseArgs(argv);
  if (help) {
    console.log(USAGE);
    return;
  }
  if (!playbook) throw createError('INVALID_ARGUMENT', `missing PLAYBOOK\n\n${USAGE}`);
  await runPlaybookFile(playbook, loadPath, loadConfig(env));
}
