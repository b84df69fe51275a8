// src/orchestrator/run.ts
// Drives one step through prepare → execute → cleanup and interprets its transition.
// RETRY loops back to prepare on the same instance; HALT (or anything unrecognized)
// prints a notice and exits without running cleanup.

import { Transition, type DescriptionRenderer, type LineEditor, type StepContext } from "../types/contracts.js";
import type { Step } from "./step.js";

export interface RunOptions {
  editor: LineEditor;
  renderer: DescriptionRenderer;
  log?: (line: string) => void;
  exit?: (code: number) => never;
  logSteps?: boolean;
  color?: boolean;
}

export const HALT_EXIT_CODE = 1;

const paint = (code: string) => (s: string) => `\x1b[${code}m${s}\x1b[0m`;

export const COLOR = {
  gray: paint("90"),
  cyan: paint("36"),
  green: paint("32"),
  yellow: paint("33"),
  red: paint("31"),
};

const plain = (s: string) => s;

const fmtMs = (ms: number) => `${Math.round(ms)}ms`;

export class Runner {
  private readonly ctx: StepContext;
  private readonly log: (line: string) => void;
  private readonly exit: (code: number) => never;
  private readonly color: typeof COLOR;

  constructor(private readonly opts: RunOptions) {
    this.ctx = { runner: this, editor: opts.editor };
    this.log = opts.log ?? ((line) => console.log(line));
    this.exit = opts.exit ?? ((code) => process.exit(code));
    const c = opts.color ?? true;
    this.color = c ? COLOR : { gray: plain, cyan: plain, green: plain, yellow: plain, red: plain };
  }

  async run(step: Step): Promise<void> {
    const { gray, cyan, green, yellow, red } = this.color;
    for (;;) {
      const stepStart = Date.now();
      await step.prepare(this.ctx);
      if (this.opts.logSteps) this.log(`${cyan("▶ step")} ${step.name}`);
      if (step.description) this.opts.renderer.render(step.description);

      // Typed loosely: a playbook loaded at run time may return anything.
      const result: unknown = await step.execute(this.ctx);

      if (result === Transition.RETRY) {
        this.log(yellow(`re-trying ${step.name}...`));
        continue;
      }
      if (result !== Transition.CONTINUE) {
        this.log(red(`cannot continue after ${step.name}; exiting`));
        this.exit(HALT_EXIT_CODE);
      }

      await step.cleanup(this.ctx);
      if (this.opts.logSteps) this.log(`${green("✓ done")} ${step.name} ${gray("(" + fmtMs(Date.now() - stepStart) + ")")}`);
      return;
    }
  }
}

export async function runPlaybook(step: Step, opts: RunOptions): Promise<void> {
  await new Runner(opts).run(step);
}
