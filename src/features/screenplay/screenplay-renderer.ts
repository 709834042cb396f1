// src/features/screenplay/screenplay-renderer.ts
import { formatSetupTag } from "./suffix.js";
import type { Segment } from "./types.js";

/**
 * Chronological view with a setup header at every segment.
 * Segments without a setup (content before the first marker) are not rendered.
 */
export function renderScreenplay(segments: readonly Segment[]): string {
  const out: string[] = [];
  let lastScene: number | null = null;
  for (const s of segments) {
    if (!s.setup) continue;
    const { letter, description } = s.setup;
    const tag = formatSetupTag(s.sceneIndex, letter, s.occurrenceSuffix);
    const header = s.sceneIndex !== lastScene
      ? `.SCENE ${s.sceneIndex} - SETUP ${letter}: ${description} ${tag}`
      : `.SETUP ${letter}: ${description} ${tag}`;
    lastScene = s.sceneIndex;
    out.push(header, "", ...s.contentLines, "");
  }
  return out.length ? out.join("\n") + "\n" : "";
}
