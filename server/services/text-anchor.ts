import { logger, errorMessage } from "../logger";
import type { LayoutLike, SegmentIndex, TextAnchorInput } from "./document-ai";

const CONTROL_CHARACTERS = /[\u0000-\u001f\u007f-\u009f]/g;

/** Collapses whitespace runs to one space and drops control characters. */
export function cleanExtractedText(text: string): string {
  return text.replace(/\s+/g, " ").replace(CONTROL_CHARACTERS, "").trim();
}

// Missing offsets default to the start or end of the buffer; unparseable ones skip the segment
function toOffset(value: SegmentIndex | undefined, fallback: number): number | null {
  if (value === null || value === undefined) return fallback;
  const offset = Number(String(value));
  return Number.isFinite(offset) ? Math.trunc(offset) : null;
}

function clamp(value: number, min: number, max: number): number {
  return Math.max(min, Math.min(value, max));
}

/**
 * Resolves a text anchor against the document text. Never throws: any shape it
 * cannot read resolves to "".
 */
export function resolveTextAnchor(anchor: TextAnchorInput, fullText: string): string {
  if (!anchor) return "";

  if (typeof anchor === "string") {
    return anchor.trim();
  }

  try {
    const content = anchor.content?.trim();
    if (content) return content;
  } catch (error) {
    logger.debug("[text-anchor] Content extraction failed:", errorMessage(error));
  }

  try {
    if (!anchor.textSegments?.length) return "";

    const parts: string[] = [];
    for (const segment of anchor.textSegments) {
      try {
        const start = toOffset(segment.startIndex, 0);
        const end = toOffset(segment.endIndex, fullText.length);
        if (start === null || end === null) {
          logger.debug("[text-anchor] Skipping segment with unreadable offsets");
          continue;
        }

        const from = clamp(start, 0, fullText.length);
        const to = clamp(end, from, fullText.length);
        if (from < to) {
          parts.push(fullText.slice(from, to));
        }
      } catch (error) {
        logger.debug("[text-anchor] Skipping malformed segment:", errorMessage(error));
      }
    }

    return cleanExtractedText(parts.join(""));
  } catch (error) {
    logger.debug("[text-anchor] Text segment extraction failed:", errorMessage(error));
  }

  return "";
}

/** Text of a layout element (cell, form field name/value): anchor first, then its own text. */
export function resolveLayoutText(layout: LayoutLike | string | null | undefined, fullText: string): string {
  if (!layout) return "";
  if (typeof layout === "string") return layout.trim();

  const anchored = resolveTextAnchor(layout.textAnchor, fullText);
  if (anchored) return anchored;

  return typeof layout.text === "string" ? layout.text.trim() : "";
}
