import { Transition, type CompletionHook, type StepContext } from "../types/contracts.js";
import { Step } from "../orchestrator/step.js";

export interface InputOptions {
  prompt?: string;
}

/** A step that reads one line from the operator and hands it to accept(). */
export abstract class AcceptUserInput extends Step {
  readonly description: string = "Please enter the required information to proceed.";
  prompt: string;

  constructor(opts: InputOptions = {}) {
    super();
    this.prompt = opts.prompt ?? "> ";
  }

  /** Tab-completion offered while this step is waiting for input. */
  protected completer(): CompletionHook | undefined {
    return undefined;
  }

  async prepare(ctx: StepContext): Promise<void> {
    const hook = this.completer();
    if (hook) ctx.editor.setCompleter(hook);
  }

  async execute(ctx: StepContext): Promise<Transition> {
    const response = await ctx.editor.readLine(this.prompt);
    if (response === null) return Transition.HALT;
    return this.accept(response);
  }

  async cleanup(ctx: StepContext): Promise<void> {
    if (this.completer()) ctx.editor.setCompleter(null);
  }

  abstract accept(response: string): Transition;
}
