import type { StepContext, Transition } from "../types/contracts.js";

/** A single unit of guided operator work. */
export abstract class Step {
  /** Guidance shown before each attempt. Empty means nothing is shown. */
  readonly description: string = "";

  /** Used in runner notices. */
  get name(): string {
    return this.constructor.name || "Step";
  }

  /** Runs before every execute attempt, retries included. */
  async prepare(_ctx: StepContext): Promise<void> {}

  abstract execute(ctx: StepContext): Promise<Transition>;

  /** Undoes prepare(). Skipped when the step halts. */
  async cleanup(_ctx: StepContext): Promise<void> {}
}
