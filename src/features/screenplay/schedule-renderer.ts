// src/features/screenplay/schedule-renderer.ts
import { formatSetupTag } from "./suffix.js";
import type { Segment, Setup, SetupLetter } from "./types.js";

export type AttributedSegment = Segment & { setup: Setup };

function hasSetup(s: Segment): s is AttributedSegment {
  return s.setup !== undefined;
}

/** Groups by setup letter in first-appearance order; scan order inside each group. */
export function groupBySetup(segments: readonly Segment[]): Map<SetupLetter, AttributedSegment[]> {
  const groups = new Map<SetupLetter, AttributedSegment[]>();
  for (const s of segments) {
    if (!hasSetup(s)) continue;
    const group = groups.get(s.setup.letter);
    if (group) group.push(s);
    else groups.set(s.setup.letter, [s]);
  }
  return groups;
}

export function scheduleEntryLine(s: AttributedSegment): string {
  const { letter, description } = s.setup;
  return `.[ ] From Scene ${s.sceneIndex} (SETUP ${letter}: ${description}) ${formatSetupTag(s.sceneIndex, letter, s.occurrenceSuffix)}`;
}

export function renderSchedule(segments: readonly Segment[]): string {
  const blocks: string[][] = [];
  for (const [letter, group] of groupBySetup(segments)) {
    const lines = [`# SETUP ${letter}`];
    for (const s of group) {
      lines.push(scheduleEntryLine(s), "", ...s.contentLines, "");
    }
    blocks.push(lines);
  }
  const out: string[] = [];
  blocks.forEach((block, i) => {
    if (i > 0) out.push("---");
    out.push(...block);
  });
  return out.length ? out.join("\n") + "\n" : "";
}
