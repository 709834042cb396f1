// src/features/screenplay/scanner.ts
import { classifyLine } from "./classifier.js";
import { occurrenceSuffix, type SuffixOverflowError } from "./suffix.js";
import type { ClassifiedLine, Segment, Setup, SetupLetter } from "./types.js";

/** Persistent cons list; prepend is O(1) and never touches earlier cells. */
type Chain<T> = { readonly head: T; readonly tail: Chain<T> } | null;

function push<T>(chain: Chain<T>, value: T): Chain<T> {
  return { head: value, tail: chain };
}

function toArray<T>(chain: Chain<T>): T[] {
  const out: T[] = [];
  for (let c = chain; c !== null; c = c.tail) out.push(c.head);
  return out.reverse();
}

interface OpenSegment {
  readonly sceneIndex: number;
  readonly setup?: Setup;
  readonly lines: Chain<string>;
  readonly lineCount: number;
  readonly pendingBlank: boolean;
}

export interface ScanState {
  readonly sceneIndex: number;
  readonly setup?: Setup;
  readonly open: OpenSegment | null;
  /** Occurrences per setup letter within the current scene. */
  readonly seen: ReadonlyMap<SetupLetter, number>;
  readonly emitted: Chain<Segment>;
}

export type ScanResult =
  | { success: true; segments: readonly Segment[] }
  | { success: false; error: SuffixOverflowError };

type StepResult =
  | { success: true; state: ScanState }
  | { success: false; error: SuffixOverflowError };

export const initialScanState: ScanState = {
  sceneIndex: 0,
  open: null,
  seen: new Map(),
  emitted: null,
};

function openSegment(sceneIndex: number, setup: Setup | undefined): OpenSegment {
  return setup
    ? { sceneIndex, setup, lines: null, lineCount: 0, pendingBlank: false }
    : { sceneIndex, lines: null, lineCount: 0, pendingBlank: false };
}

/**
 * Finalizes the open segment. Empty segments vanish without consuming a suffix.
 * The (scene, letter) registry only needs the current scene: scene indexes never repeat.
 */
function closeSegment(state: ScanState): StepResult {
  const open = state.open;
  if (!open || open.lineCount === 0) return { success: true, state: { ...state, open: null } };

  const contentLines = Object.freeze(toArray(open.lines));
  if (!open.setup) {
    const segment: Segment = Object.freeze({ sceneIndex: open.sceneIndex, contentLines, occurrenceSuffix: "" });
    return { success: true, state: { ...state, open: null, emitted: push(state.emitted, segment) } };
  }

  const letter = open.setup.letter;
  const index = state.seen.get(letter) ?? 0;
  const suffix = occurrenceSuffix(open.sceneIndex, letter, index);
  if (!suffix.success) return suffix;

  const seen = new Map(state.seen);
  seen.set(letter, index + 1);
  const segment: Segment = Object.freeze({
    sceneIndex: open.sceneIndex,
    setup: open.setup,
    contentLines,
    occurrenceSuffix: suffix.suffix,
  });
  return { success: true, state: { ...state, open: null, seen, emitted: push(state.emitted, segment) } };
}

function appendContent(state: ScanState, text: string): ScanState {
  const open = state.open ?? openSegment(state.sceneIndex, state.setup);
  let lines = open.lines;
  let lineCount = open.lineCount;
  if (open.pendingBlank && lineCount > 0) {
    lines = push(lines, "");
    lineCount++;
  }
  lines = push(lines, text);
  return { ...state, open: { ...open, lines, lineCount: lineCount + 1, pendingBlank: false } };
}

export function step(state: ScanState, line: ClassifiedLine): StepResult {
  switch (line.kind) {
    case "scene-heading": {
      const closed = closeSegment(state);
      if (!closed.success) return closed;
      // The active setup carries over into the new scene until another marker replaces it.
      return { success: true, state: { ...closed.state, sceneIndex: state.sceneIndex + 1, seen: new Map() } };
    }
    case "setup-marker": {
      const closed = closeSegment(state);
      if (!closed.success) return closed;
      return {
        success: true,
        state: { ...closed.state, setup: line.setup, open: openSegment(state.sceneIndex, line.setup) },
      };
    }
    case "transition":
      return { success: true, state };
    case "blank":
      return state.open && state.open.lineCount > 0
        ? { success: true, state: { ...state, open: { ...state.open, pendingBlank: true } } }
        : { success: true, state };
    case "content":
      return { success: true, state: appendContent(state, line.text) };
    default: {
      const unreachable: never = line;
      return unreachable;
    }
  }
}

export function scanLines(lines: readonly string[]): ScanResult {
  let state = initialScanState;
  for (const raw of lines) {
    const next = step(state, classifyLine(raw));
    if (!next.success) return next;
    state = next.state;
  }
  const closed = closeSegment(state);
  if (!closed.success) return closed;
  return { success: true, segments: Object.freeze(toArray(closed.state.emitted)) };
}
