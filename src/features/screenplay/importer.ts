import { createHash } from "crypto";
import type { ScreenplayDocument } from "./types.js";

/** LF line endings, no BOM. Trailing whitespace is content and stays. */
export function normalize(text: string): string {
  return text.replace(/^\uFEFF/, "").replace(/\r\n/g, "\n").replace(/\r/g, "\n");
}

export function importScreenplay(raw: string, title = "Screenplay"): ScreenplayDocument {
  const rawText = normalize(raw);
  const checksum = createHash("sha256").update(rawText).digest("hex");
  return {
    id: checksum.slice(0, 8),
    title,
    rawText,
    checksum,
    lines: rawText.split("\n"),
  };
}
