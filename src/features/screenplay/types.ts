// src/features/screenplay/types.ts

export interface ScreenplayDocument {
  id: string;          // checksum prefix
  title: string;
  rawText: string;     // normalized LF text, trailing whitespace untouched
  checksum: string;    // sha256 of normalized text
  lines: string[];
}

/** Uppercase A-Z */
export type SetupLetter = string;

export interface Setup {
  letter: SetupLetter;
  description: string;
}

export type ClassifiedLine =
  | { kind: "scene-heading"; text: string; sceneNumber?: string }
  | { kind: "setup-marker"; setup: Setup }
  | { kind: "transition"; text: string }
  | { kind: "blank" }
  | { kind: "content"; text: string };

export interface Segment {
  sceneIndex: number;        // 1-based, 0 before the first heading
  setup?: Setup;             // absent for content seen before any setup marker
  contentLines: readonly string[];
  occurrenceSuffix: string;  // "" for the first (scene, letter) occurrence
}

export interface SetupSummary {
  letter: SetupLetter;
  descriptions: string[];    // distinct variants, first-seen order
  segmentCount: number;
  sceneIndexes: number[];
  lineCount: number;
}

export interface ScheduleStats {
  scenes: number;
  segments: number;
  setups: SetupSummary[];
  unattributedSegments: number;
  unattributedLines: number;
}
