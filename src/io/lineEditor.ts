// src/io/lineEditor.ts
// Process-wide line editor over node:readline. Lines are queued as they arrive so
// piped input is not lost between prompts; tab-completion goes through whichever
// completion hook the current step installed.

import readline, { type Interface } from "node:readline";
import type { CompletionHook, LineEditor } from "../types/contracts.js";
import { collectCandidates } from "../tasks/completion.js";
import { DEFAULT_HISTORY_SIZE } from "../config.js";

export interface ReadlineEditorOptions {
  input?: NodeJS.ReadableStream;
  output?: NodeJS.WritableStream;
  terminal?: boolean;
  history?: string[];
  historySize?: number;
}

export class ReadlineEditor implements LineEditor {
  private readonly rl: Interface;
  private readonly queued: string[] = [];
  private readonly entries: string[];
  private readonly historySize: number;
  private waiting: ((line: string | null) => void) | undefined;
  private hook: CompletionHook | null = null;
  private closed = false;

  constructor(opts: ReadlineEditorOptions = {}) {
    this.historySize = opts.historySize ?? DEFAULT_HISTORY_SIZE;
    this.entries = (opts.history ?? []).slice(-this.historySize);
    const input = opts.input ?? process.stdin;
    const output = opts.output ?? process.stdout;
    this.rl = readline.createInterface({
      input,
      output,
      terminal: opts.terminal ?? ("isTTY" in output && output.isTTY === true),
      // readline keeps its history newest first
      history: [...this.entries].reverse(),
      historySize: this.historySize,
      completer: (line: string) => this.complete(line),
    });
    this.rl.on("line", (line) => this.receive(line));
    this.rl.on("close", () => {
      this.closed = true;
      this.deliver(null);
    });
  }

  readLine(prompt: string): Promise<string | null> {
    this.rl.setPrompt(prompt);
    if (!this.closed) this.rl.prompt();
    const next = this.queued.shift();
    if (next !== undefined) return Promise.resolve(next);
    if (this.closed) return Promise.resolve(null);
    return new Promise((resolve) => {
      this.waiting = resolve;
    });
  }

  setCompleter(hook: CompletionHook | null): void {
    this.hook = hook;
  }

  complete(line: string): [string[], string] {
    return [this.hook ? collectCandidates(this.hook, line) : [], line];
  }

  /** Entries typed so far, oldest first, capped to the history size. */
  history(): string[] {
    return [...this.entries];
  }

  close(): void {
    this.rl.close();
  }

  private receive(line: string): void {
    if (line.length > 0) {
      this.entries.push(line);
      if (this.entries.length > this.historySize) this.entries.shift();
    }
    if (this.waiting) this.deliver(line);
    else this.queued.push(line);
  }

  private deliver(line: string | null): void {
    const resolve = this.waiting;
    this.waiting = undefined;
    resolve?.(line);
  }
}
