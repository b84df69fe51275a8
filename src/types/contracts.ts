import type { Runner } from "../orchestrator/run.js";

export const Transition = {
  CONTINUE: "continue",
  RETRY: "retry",
  HALT: "halt",
} as const;

export type Transition = (typeof Transition)[keyof typeof Transition];

const TRANSITIONS: ReadonlySet<unknown> = new Set(Object.values(Transition));

export function isTransition(value: unknown): value is Transition {
  return TRANSITIONS.has(value);
}

/**
 * Offers tab-completion candidates. Called with index 0, 1, 2, … for the same
 * prefix until it returns undefined.
 */
export type CompletionHook = (prefix: string, index: number) => string | undefined;

export interface LineEditor {
  /** Resolves with the typed line, or null once the input is closed. */
  readLine(prompt: string): Promise<string | null>;
  /** At most one hook is installed; null uninstalls. */
  setCompleter(hook: CompletionHook | null): void;
}

export interface DescriptionRenderer {
  render(text: string): void;
}

export interface StepContext {
  runner: Runner;
  editor: LineEditor;
}
