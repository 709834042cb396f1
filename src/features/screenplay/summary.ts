// src/features/screenplay/summary.ts
import type { ScheduleStats, Segment, SetupSummary } from "./types.js";

export function summarizeSetups(segments: readonly Segment[]): SetupSummary[] {
  const byLetter = new Map<string, SetupSummary>();
  for (const s of segments) {
    if (!s.setup) continue;
    let entry = byLetter.get(s.setup.letter);
    if (!entry) {
      entry = { letter: s.setup.letter, descriptions: [], segmentCount: 0, sceneIndexes: [], lineCount: 0 };
      byLetter.set(s.setup.letter, entry);
    }
    entry.segmentCount++;
    entry.lineCount += s.contentLines.length;
    if (!entry.descriptions.includes(s.setup.description)) entry.descriptions.push(s.setup.description);
    if (!entry.sceneIndexes.includes(s.sceneIndex)) entry.sceneIndexes.push(s.sceneIndex);
  }
  return Array.from(byLetter.values());
}

export function computeStats(segments: readonly Segment[]): ScheduleStats {
  const unattributed = segments.filter(s => !s.setup);
  return {
    scenes: new Set(segments.map(s => s.sceneIndex)).size,
    segments: segments.length,
    setups: summarizeSetups(segments),
    unattributedSegments: unattributed.length,
    unattributedLines: unattributed.reduce((acc, s) => acc + s.contentLines.length, 0),
  };
}
