// src/features/screenplay/classifier.ts
import type { ClassifiedLine, Setup } from "./types.js";

/** INT. / EXT. / EST. / INT./EXT. / INT/EXT. / I/E. (period or space after the prefix) */
const SCENE_HEADING_RE = /^(?:INT\.?\/EXT|INT|EXT|EST|I\/E)[.\s]/i;

/** Forced heading: one leading period, then a letter or digit ("..." is not a heading) */
const FORCED_HEADING_RE = /^\.[A-Za-z0-9]/;

/** Optional scene number token: #12# or #12A# */
const SCENE_NUMBER_RE = /#(\d+[A-Za-z]*)#\s*$/;

/** Setup marker: [[SETUP A: Wide on the kitchen]] */
const SETUP_RE = /^\s*\[\[SETUP\s+([A-Z])\s*:\s*(.+?)\s*\]\]/;

const FIXED_TRANSITIONS = new Set(["FADE IN:", "FADE OUT.", "FADE TO BLACK.", "CUT TO BLACK."]);

export function isBlank(line: string): boolean {
  return line.trim() === "";
}

export function isSceneHeading(line: string): boolean {
  const t = line.trim();
  return SCENE_HEADING_RE.test(t) || FORCED_HEADING_RE.test(t);
}

export function isTransition(line: string): boolean {
  const t = line.trim().toUpperCase();
  if (!t) return false;
  if (t.endsWith("TO:")) return true;
  if (FIXED_TRANSITIONS.has(t)) return true;
  // forced transition; "> TEXT <" is centered text, not a transition
  return t.startsWith(">") && !t.endsWith("<");
}

export function parseSetupMarker(line: string): Setup | null {
  const m = SETUP_RE.exec(line);
  if (!m) return null;
  const letter = m[1];
  if (!letter) return null;
  return { letter, description: (m[2] ?? "").trim() };
}

export function classifyLine(line: string): ClassifiedLine {
  if (isBlank(line)) return { kind: "blank" };

  const setup = parseSetupMarker(line);
  if (setup) return { kind: "setup-marker", setup };

  if (isSceneHeading(line)) {
    const text = line.trim();
    const num = SCENE_NUMBER_RE.exec(text)?.[1];
    return num ? { kind: "scene-heading", text, sceneNumber: num } : { kind: "scene-heading", text };
  }

  if (isTransition(line)) return { kind: "transition", text: line.trim() };

  return { kind: "content", text: line };
}
