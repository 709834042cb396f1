// src/features/screenplay/pipeline.ts
import { importScreenplay } from "./importer.js";
import { scanLines } from "./scanner.js";
import { renderSchedule } from "./schedule-renderer.js";
import { renderScreenplay } from "./screenplay-renderer.js";
import { computeStats } from "./summary.js";
import type { SuffixOverflowError } from "./suffix.js";
import type { ScheduleStats, ScreenplayDocument, Segment } from "./types.js";

/** Progress callback type for pipeline stages */
export type PipelineProgressCallback = (progress: number, message?: string) => void;

export type PipelineResult =
  | {
      success: true;
      document: ScreenplayDocument;
      segments: readonly Segment[];
      schedule: string;
      screenplay: string;
      stats: ScheduleStats;
    }
  | { success: false; document: ScreenplayDocument; error: SuffixOverflowError };

/**
 * Pure in-memory runner. Does not touch FS.
 * Both views are rendered before anything is returned so a caller never sees half a result.
 */
export function runSetupPipeline(
  text: string,
  opts: { title?: string; onProgress?: PipelineProgressCallback } = {}
): PipelineResult {
  const { onProgress } = opts;
  onProgress?.(0, "Importing screenplay...");
  const document = importScreenplay(text, opts.title);

  onProgress?.(20, `Scanning ${document.lines.length} lines...`);
  const scanned = scanLines(document.lines);
  if (!scanned.success) {
    onProgress?.(100, "Scan failed");
    return { success: false, document, error: scanned.error };
  }

  onProgress?.(60, "Rendering shooting schedule...");
  const schedule = renderSchedule(scanned.segments);
  onProgress?.(80, "Rendering annotated screenplay...");
  const screenplay = renderScreenplay(scanned.segments);

  const stats = computeStats(scanned.segments);
  onProgress?.(100, `Completed: ${stats.segments} segments across ${stats.setups.length} setups`);
  return { success: true, document, segments: scanned.segments, schedule, screenplay, stats };
}
