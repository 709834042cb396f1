// src/features/screenplay/suffix.ts
import type { SetupLetter } from "./types.js";

/** 26 + 26^2 + 26^3: one-, two- and three-letter suffixes */
export const MAX_OCCURRENCE_INDEX = 26 + 26 ** 2 + 26 ** 3;

export class SuffixOverflowError extends Error {
  constructor(
    public readonly sceneIndex: number,
    public readonly letter: SetupLetter,
    public readonly occurrenceIndex: number
  ) {
    super(
      `Setup ${letter} repeats ${occurrenceIndex} times in scene ${sceneIndex}; ` +
      `at most ${MAX_OCCURRENCE_INDEX} repeats can be tagged`
    );
    this.name = "SuffixOverflowError";
  }
}

export type SuffixResult =
  | { success: true; suffix: string }
  | { success: false; error: SuffixOverflowError };

/** Bijective base-26 (A..Z, AA..ZZ, AAA..ZZZ); 0 is the bare, suffix-less occurrence. */
export function toAlphaSuffix(index: number): string {
  let n = index;
  let out = "";
  while (n > 0) {
    n -= 1;
    out = String.fromCharCode(65 + (n % 26)) + out;
    n = Math.floor(n / 26);
  }
  return out;
}

export function occurrenceSuffix(sceneIndex: number, letter: SetupLetter, index: number): SuffixResult {
  if (index > MAX_OCCURRENCE_INDEX) {
    return { success: false, error: new SuffixOverflowError(sceneIndex, letter, index) };
  }
  return { success: true, suffix: toAlphaSuffix(index) };
}

export function formatSetupTag(sceneIndex: number, letter: SetupLetter, suffix: string): string {
  return `#${sceneIndex}${letter}${suffix}#`;
}
