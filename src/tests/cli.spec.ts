import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, readFileSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { pathToFileURL } from 'node:url';
import { Transition } from '../types/contracts.js';
import { Step } from '../orchestrator/step.js';
import { SerialPlaybook } from '../orchestrator/serial.js';
import { Confirm } from '../tasks/confirm.js';
import { loadPlaybook, parseArgs, persistHistory, parseSpecifier, resolveModule, toStep } from '../runner.js';
import { PlaybookError, createError, formatError, getExitCode } from '../errors.js';
import { loadConfig } from '../config.js';

class Noop extends Step {
  async execute(): Promise<Transition> { return Transition.CONTINUE; }
}

describe('parseArgs', () => {
  it('reads the load path and playbook', () => {
    expect(parseArgs(['node', 'playbook', '-L', 'lib', './x.js:Deploy'])).toEqual({ help: false, loadPath: 'lib', playbook: './x.js:Deploy' });
    expect(parseArgs(['node', 'playbook', '-Llib', 'pkg'])).toEqual({ help: false, loadPath: 'lib', playbook: 'pkg' });
    expect(parseArgs(['node', 'playbook', '--load-path=lib', 'pkg'])).toEqual({ help: false, loadPath: 'lib', playbook: 'pkg' });
  });

  it('recognizes help', () => {
    expect(parseArgs(['node', 'playbook', '--help']).help).toBe(true);
  });

  it('rejects unknown options and extra arguments', () => {
    expect(() => parseArgs(['node', 'playbook', '--fast', 'pkg'])).toThrow('unknown option --fast');
    expect(() => parseArgs(['node', 'playbook', 'a', 'b'])).toThrow('unexpected argument b');
    expect(() => parseArgs(['node', 'playbook', '-L'])).toThrow('-L requires a directory');
  });
});

describe('parseSpecifier', () => {
  it('splits on the last colon', () => {
    expect(parseSpecifier('./playbooks/release.js:release')).toEqual({ module: './playbooks/release.js', exportName: 'release' });
    expect(parseSpecifier('@team/playbooks:Deploy')).toEqual({ module: '@team/playbooks', exportName: 'Deploy' });
  });

  it('defaults to the default export', () => {
    expect(parseSpecifier('./release.js')).toEqual({ module: './release.js', exportName: 'default' });
  });
});

describe('resolveModule', () => {
  it('resolves relative modules against the load path', () => {
    expect(resolveModule('./release.js', '/srv/playbooks')).toBe(pathToFileURL('/srv/playbooks/release.js').href);
    expect(resolveModule('/abs/release.js', '/srv/playbooks')).toBe(pathToFileURL('/abs/release.js').href);
  });

  it('leaves package names alone', () => {
    expect(resolveModule('@team/playbooks', '/srv/playbooks')).toBe('@team/playbooks');
  });
});

describe('toStep', () => {
  it('accepts instances', () => {
    const playbook = new SerialPlaybook('all', []);
    expect(toStep(playbook, 'x')).toBe(playbook);
  });

  it('instantiates subclasses', () => {
    expect(toStep(Noop, 'x')).toBeInstanceOf(Noop);
    expect(toStep(Confirm, 'x')).toBeInstanceOf(Confirm);
  });

  it('rejects anything else', () => {
    expect(() => toStep(class NotAStep {}, 'mod:NotAStep')).toThrow(
      "The expression mod:NotAStep doesn't evaluate to a playbook.\nCannot continue; exiting.",
    );
    expect(() => toStep(undefined, 'mod:missing')).toThrow(PlaybookError);
  });
});

describe('loadPlaybook', () => {
  it('reports a module that is not a playbook', async () => {
    const err = await loadPlaybook('node:path').catch((e: unknown) => e);
    expect(err).toBeInstanceOf(PlaybookError);
    expect(err instanceof PlaybookError && err.code).toBe('NOT_A_PLAYBOOK');
  });

  it('reports modules that fail to load', async () => {
    const err = await loadPlaybook('./no-such-playbook.js:release', '/nonexistent').catch((e: unknown) => e);
    expect(err instanceof PlaybookError && err.code).toBe('LOAD_FAILED');
  });
});

describe('errors', () => {
  it('formats playbook errors with their suggestion', () => {
    const err = new PlaybookError('gone', 'MISSING_RESOURCE', 'look again');
    expect(formatError(err)).toBe('Error [MISSING_RESOURCE]: gone\n\nSuggestion: look again');
    expect(formatError(new Error('boom'))).toBe('Error: boom');
    expect(formatError('plain')).toBe('Error: plain');
  });

  it('prints a non-playbook as two plain lines', () => {
    let err: unknown;
    try { toStep(42, 'mod:answer'); } catch (e: unknown) { err = e; }
    expect(formatError(err)).toBe("The expression mod:answer doesn't evaluate to a playbook.\nCannot continue; exiting.");
    expect(formatError(createError('NOT_A_PLAYBOOK', 'x'))).toBe('x');
  });

  it('maps usage errors to status 2', () => {
    expect(getExitCode(new PlaybookError('bad', 'INVALID_ARGUMENT'))).toBe(2);
    expect(getExitCode(new Error('boom'))).toBe(1);
  });
});

describe('persistHistory', () => {
  let dir: string;
  beforeEach(() => { dir = mkdtempSync(join(tmpdir(), 'playbook-cli-')); });
  afterEach(() => { rmSync(dir, { recursive: true, force: true }); });

  it('writes the history file', () => {
    const config = loadConfig({ PLAYBOOK_HISTORY: join(dir, 'history') });
    const reported: string[] = [];
    expect(persistHistory(config, ['y', 'n'], (m) => reported.push(m))).toBe(true);
    expect(readFileSync(join(dir, 'history'), 'utf-8')).toBe('y\nn\n');
    expect(reported).toEqual([]);
  });

  it('reports an unwritable path instead of throwing', () => {
    writeFileSync(join(dir, 'file'), 'x');
    const config = loadConfig({ PLAYBOOK_HISTORY: join(dir, 'file', 'history') });
    const reported: string[] = [];
    expect(persistHistory(config, ['y'], (m) => reported.push(m))).toBe(false);
    expect(reported).toHaveLength(1);
    expect(reported[0]).toMatch(/^Error: (ENOTDIR|EEXIST)/);
  });
});
