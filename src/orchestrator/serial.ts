import { Transition, type StepContext } from "../types/contracts.js";
import { Step } from "./step.js";

/**
 * Runs its children in order, each through the runner's full lifecycle.
 * A halting child exits the process, so control only comes back here on CONTINUE.
 */
export class SerialPlaybook extends Step {
  readonly steps: readonly Step[];

  constructor(readonly description: string, steps: readonly Step[]) {
    super();
    this.steps = [...steps];
  }

  async execute(ctx: StepContext): Promise<Transition> {
    for (const step of this.steps) {
      await ctx.runner.run(step);
    }
    return Transition.CONTINUE;
  }
}

/** Build a playbook that runs the given steps in series. */
export function serial(description: string, steps: readonly Step[]): SerialPlaybook {
  return new SerialPlaybook(description, steps);
}
