import type { CompletionHook } from "../types/contracts.js";

/** Drain a completion hook for one prefix, the way the line editor calls it. */
export function collectCandidates(hook: CompletionHook, prefix: string): string[] {
  const out: string[] = [];
  for (let i = 0; ; i++) {
    const candidate = hook(prefix, i);
    if (candidate === undefined) return out;
    out.push(candidate);
  }
}

/**
 * Completion over a fixed word list. A prefix that already equals a word
 * offers only that word.
 */
export function prefixCompleter(words: readonly string[]): CompletionHook {
  return (prefix, index) => {
    const matches = words.includes(prefix) ? [prefix] : words.filter(w => w.startsWith(prefix));
    return matches[index];
  };
}
