import type { Marker } from "@shared/schema";
import { logger, errorMessage } from "../logger";
import { ValidationError } from "./errors";
import { createMarker } from "./marker-builder";

// Pieces shared by the line templates. Separators are horizontal whitespace only,
// so a match never runs into the next line.
const NAME = "([A-Za-zäöüßÄÖÜ()\\- \\t]+?)";
const VALUE = "([\\d.,<>≤≥±]+)";
const UNIT = "([a-zA-Zµμ/%]+(?:/[a-zA-Zµμ]+)?)";
const REFERENCE = "([\\d.,<>≤≥±% \\t-]+)";

export interface LinePattern {
  name: string;
  pattern: RegExp;
}

/** Line templates for marker rows in the flat text. All of them run; none is exclusive. */
export const LINE_PATTERNS: readonly LinePattern[] = [
  {
    name: "name value unit (reference)",
    pattern: new RegExp(`^${NAME}[ \\t]+${VALUE}[ \\t]+${UNIT}[ \\t]*(?:\\(?${REFERENCE}?\\)?)?`, "gm"),
  },
  {
    name: "name: value unit",
    pattern: new RegExp(`^${NAME}:[ \\t]+${VALUE}[ \\t]+${UNIT}`, "gm"),
  },
  {
    name: "name<tab>value<tab>unit",
    pattern: new RegExp(`^${NAME}\\t+${VALUE}\\t+${UNIT}`, "gm"),
  },
];

const MEDICAL_TERMS = [
  "vitamin", "ferritin", "calcium", "magnesium", "zink", "selen",
  "leukoz", "erythroz", "hämoglobin", "hämatokrit", "thromboz",
  "crp", "tsh", "linol", "omega", "epa", "dha",
];

const NON_MEDICAL_TERMS = ["straße", "telefon", "email", "datum", "seite", "eingang", "ausgang"];

/** Known medical terms always pass; otherwise any name free of address and page vocabulary does. */
export function isValidTestName(testName: string): boolean {
  if (!/\p{L}/u.test(testName) || testName.length < 3) return false;

  const lower = testName.toLowerCase();
  if (MEDICAL_TERMS.some((term) => lower.includes(term))) return true;

  return !NON_MEDICAL_TERMS.some((term) => lower.includes(term));
}

/**
 * Recovers markers straight from the document text, for reports whose tables
 * the layout service did not detect. Each test name is taken at most once.
 */
export function extractMarkersFromText(fullText: string): Marker[] {
  if (!fullText) {
    logger.warn("[pattern-extraction] Document has no text for pattern extraction");
    return [];
  }

  const markers: Marker[] = [];
  const seen = new Set<string>();

  for (const { name, pattern } of LINE_PATTERNS) {
    for (const match of fullText.matchAll(pattern)) {
      const testName = match[1].trim();
      if (seen.has(testName) || !isValidTestName(testName)) continue;

      try {
        markers.push(createMarker({
          test: testName,
          result: match[2],
          unit: match[3],
          referenceRange: match[4] ?? "",
        }));
        seen.add(testName);
      } catch (error) {
        if (!(error instanceof ValidationError)) throw error;
        logger.debug(`[pattern-extraction] Skipping "${testName}" (${name}):`, errorMessage(error));
      }
    }
  }

  logger.info(`[pattern-extraction] Recovered ${markers.length} markers from text`);
  return markers;
}
