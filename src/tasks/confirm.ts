import { Transition, type CompletionHook } from "../types/contracts.js";
import { prefixCompleter } from "./completion.js";
import { AcceptUserInput, type InputOptions } from "./input.js";

const ANSWERS = ["y", "n"] as const;

/** Pauses until the operator answers y (continue) or n (halt). */
export class Confirm extends AcceptUserInput {
  readonly description: string = "Pausing until you wish to continue.";
  private readonly hook = prefixCompleter(ANSWERS);

  constructor(opts: InputOptions = {}) {
    super({ prompt: opts.prompt ?? "continue? (y|n) " });
  }

  protected completer(): CompletionHook {
    return this.hook;
  }

  accept(response: string): Transition {
    if (response === "y") return Transition.CONTINUE;
    if (response === "n") return Transition.HALT;
    return Transition.RETRY;
  }
}
