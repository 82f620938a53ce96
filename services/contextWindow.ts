/**
 * CONTEXT WINDOW
 *
 * Deterministic sliding-window chunker over whitespace-separated tokens.
 * Consecutive windows share `overlap` tokens.
 *
 * @example
 * new ContextWindow(3, 1).generate("one two three four five six");
 * // ["one two three", "three four five", "five six"]
 */

import { WindowConfigError } from "./errors";

export class ContextWindow {
  readonly windowSize: number;
  readonly overlap: number;

  constructor(windowSize: number, overlap = 0) {
    if (!Number.isInteger(windowSize)) {
      throw new WindowConfigError({ parameter: "windowSize", value: windowSize, constraint: "must be an integer" });
    }
    if (!Number.isInteger(overlap)) {
      throw new WindowConfigError({ parameter: "overlap", value: overlap, constraint: "must be an integer" });
    }
    if (windowSize <= 0) {
      throw new WindowConfigError({
        parameter: "windowSize",
        value: windowSize,
        constraint: "must be greater than zero",
      });
    }
    if (overlap < 0) {
      throw new WindowConfigError({ parameter: "overlap", value: overlap, constraint: "must be zero or positive" });
    }
    if (overlap >= windowSize) {
      throw new WindowConfigError({
        parameter: "overlap",
        value: overlap,
        constraint: "must be smaller than windowSize",
      });
    }
    this.windowSize = windowSize;
    this.overlap = overlap;
  }

  get step(): number {
    return this.windowSize - this.overlap;
  }

  generate(text: string): string[] {
    const tokens = text.split(/\s+/).filter((token) => token !== "");
    if (tokens.length === 0) return [];

    const windows: string[] = [];
    const step = this.step;
    for (let start = 0; start < tokens.length; start += step) {
      windows.push(tokens.slice(start, start + this.windowSize).join(" "));
      if (step <= 0) break; // unreachable after construction checks
    }
    return windows;
  }
}
