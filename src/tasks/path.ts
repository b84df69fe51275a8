import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { escape, globSync } from "glob";
import type { CompletionHook, StepContext, Transition } from "../types/contracts.js";
import { expandHome } from "../config.js";
import { createError } from "../errors.js";
import { AcceptUserInput, type InputOptions } from "./input.js";

export interface PathPromptOptions extends InputOptions {
  /** Directory that a leading `~` stands for. */
  homeDir?: string;
  /** Directory that relative paths are completed and checked against. */
  cwd?: string;
}

/**
 * Asks for a filesystem path, with glob-based tab-completion.
 * Subclasses receive the home-expanded path once it is known to exist.
 */
export abstract class PathPrompt extends AcceptUserInput {
  readonly description: string = "Please enter a path to proceed.";
  private readonly homeDir: string;
  private readonly cwd: string | undefined;
  private cache: { prefix: string; matches: string[] } | undefined;

  constructor(opts: PathPromptOptions = {}) {
    super({ prompt: opts.prompt ?? "path> " });
    this.homeDir = opts.homeDir ?? os.homedir();
    this.cwd = opts.cwd;
  }

  async prepare(ctx: StepContext): Promise<void> {
    this.cache = undefined;
    await super.prepare(ctx);
  }

  protected completer(): CompletionHook {
    return (prefix, index) => this.matches(prefix)[index];
  }

  /** Completions for `prefix`, recomputed only when the typed text changes. */
  matches(prefix: string): string[] {
    if (this.cache?.prefix === prefix) return this.cache.matches;
    const expanded = expandHome(prefix, this.homeDir);
    let matches = globSync(escape(expanded) + "*", {
      mark: true,
      cwd: this.cwd,
      dotRelative: prefix.startsWith("./"),
    }).sort();
    if (prefix.startsWith("~")) {
      const home = this.homeDir;
      matches = matches.map(m => (m === home || m.startsWith(home + path.sep) ? "~" + m.slice(home.length) : m));
    }
    this.cache = { prefix, matches };
    return matches;
  }

  accept(response: string): Transition {
    const resolved = expandHome(response, this.homeDir);
    if (!fs.existsSync(path.resolve(this.cwd ?? process.cwd(), resolved))) {
      throw createError("MISSING_RESOURCE", `path does not exist: ${resolved}`, { path: resolved });
    }
    return this.acceptPath(resolved);
  }

  abstract acceptPath(path: string): Transition;
}
