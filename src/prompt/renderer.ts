import type { DescriptionRenderer } from "../types/contracts.js";
import { DEFAULT_WRAP_WIDTH } from "../config.js";

/** Strip the indentation common to every non-blank line. */
export function dedent(text: string): string {
  const lines = text.split("\n");
  let margin: number | undefined;
  for (const line of lines) {
    if (!line.trim()) continue;
    const indent = line.length - line.trimStart().length;
    margin = margin === undefined ? indent : Math.min(margin, indent);
  }
  if (!margin) return text;
  const cut = margin;
  return lines.map(l => (l.trim() ? l.slice(cut) : "")).join("\n");
}

/** Greedy word wrap; words longer than `width` are split. */
export function wrap(text: string, width: number = DEFAULT_WRAP_WIDTH): string[] {
  const words = text.split(/\s+/).filter(Boolean);
  const lines: string[] = [];
  let cur = "";
  for (let word of words) {
    while (word.length > width) {
      if (cur) { lines.push(cur); cur = ""; }
      lines.push(word.slice(0, width));
      word = word.slice(width);
    }
    if (!word) continue;
    if (!cur) cur = word;
    else if (cur.length + 1 + word.length <= width) cur += " " + word;
    else { lines.push(cur); cur = word; }
  }
  if (cur) lines.push(cur);
  return lines;
}

/**
 * Lay out a step description: paragraphs are separated by blank lines,
 * each dedented and wrapped, with a blank line before and after every paragraph.
 */
export function renderDescription(text: string, width: number = DEFAULT_WRAP_WIDTH): string[] {
  const out: string[] = [""];
  for (const paragraph of text.split("\n\n")) {
    out.push(...wrap(dedent(paragraph), width));
    out.push("");
  }
  return out;
}

export class ConsoleRenderer implements DescriptionRenderer {
  constructor(
    private readonly width: number = DEFAULT_WRAP_WIDTH,
    private readonly print: (line: string) => void = (line) => console.log(line),
  ) {}

  render(text: string): void {
    for (const line of renderDescription(text, this.width)) this.print(line);
  }
}
