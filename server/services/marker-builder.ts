import type { Marker, MarkerCategory } from "@shared/schema";
import { logger } from "../logger";
import { classifyMarker } from "./classifier";
import { ValidationError } from "./errors";
import { cleanExtractedText } from "./text-anchor";

const MAX_TEST_NAME_LENGTH = 200;

// A leading word only counts when it is the whole word ("Seite 2", not "Testosteron")
const WORD_END = "(?![\\p{L}\\p{N}])";

const EXCLUSION_PATTERNS: readonly RegExp[] = [
  // Table headers
  new RegExp(`^(seite|page|datum|date|patient|name|einheit|unit|ergebnis|result|referenz|test|parameter)${WORD_END}`, "iu"),
  // Addresses and contact details
  /(straße|str\.|plz|telefon|phone|fax|e-?mail|@|www\.)/iu,
  // Separator lines and bare numbers
  /^[-=]+$/,
  /^\d+$/,
  /^\d+[.,]\d+$/,
  // Articles and prepositions starting a sentence
  new RegExp(`^(von|to|from|der|die|das|ein|eine|für|for|with|mit)${WORD_END}`, "iu"),
  // Entry/exit date labels
  /(?<![\p{L}\p{N}])(eingang|ausgang|entry|exit)$/iu,
];

const LETTER = /\p{L}/u;
const RESULT_SIGNAL = /[\d<>≤≥±]|negativ|positiv|normal|erhöht|niedrig|high|low/i;

/** Whether a table row plausibly holds one lab result: name in column 0, value in column 1. */
export function isValidMarkerRow(row: readonly string[]): boolean {
  if (row.length < 2) return false;

  const testName = row[0].trim();
  const resultValue = row[1].trim();

  if (!testName || !resultValue) return false;
  if (testName.length < 2 || testName.length > MAX_TEST_NAME_LENGTH) return false;
  if (!LETTER.test(testName)) return false;
  if (EXCLUSION_PATTERNS.some((pattern) => pattern.test(testName))) return false;

  return RESULT_SIGNAL.test(resultValue);
}

/**
 * Incomplete unit fragments left by OCR and their repaired form. "op" is how
 * one lab's "%" glyph comes out of the layout service.
 */
export const TRUNCATED_UNIT_FIXES: ReadonlyMap<string, string> = new Map([
  ["mg/", "mg/l"],
  ["µg/", "µg/l"],
  ["ng/", "ng/ml"],
  ["pg/", "pg/ml"],
  ["mmol/", "mmol/l"],
  ["pmol/", "pmol/l"],
  ["op", "%"],
  ["1000/", "1000/µl"],
  ["Mill/", "Mill/µl"],
]);

export function fixTruncatedUnit(unit: string): string {
  return TRUNCATED_UNIT_FIXES.get(unit) ?? unit;
}

const CRITICAL_PATTERNS: readonly RegExp[] = [
  /\*+/,
  /kritisch/i,
  /critical/i,
  /alarm/i,
  /↑↑/,
  /↓↓/,
  /sehr (hoch|niedrig)/i,
  /very (high|low)/i,
];

export function isCriticalValue(result: string, referenceRange: string): boolean {
  return CRITICAL_PATTERNS.some((pattern) => pattern.test(result) || pattern.test(referenceRange));
}

// German reports write decimals with a comma
export function normalizeResultValue(value: string): string {
  return value.trim().replace(/,/g, ".");
}

export interface MarkerFields {
  test: string;
  result: string;
  unit?: string;
  referenceRange?: string;
  category?: MarkerCategory;
  confidence?: number;
}

/**
 * Normalizes and classifies one marker.
 * @throws ValidationError when the name or the value is empty after normalization
 */
export function createMarker(fields: MarkerFields): Marker {
  const test = cleanExtractedText(fields.test);
  const result = normalizeResultValue(cleanExtractedText(fields.result));

  if (!test || !result) {
    throw new ValidationError(`Invalid marker: test='${fields.test}', result='${fields.result}'`);
  }

  const referenceRange = cleanExtractedText(fields.referenceRange ?? "");
  const confidence = Math.min(1, Math.max(0, fields.confidence ?? 0));

  return {
    test,
    result,
    unit: fixTruncatedUnit((fields.unit ?? "").trim()),
    reference_range: referenceRange,
    category: fields.category ?? classifyMarker(test),
    confidence,
    is_critical: isCriticalValue(result, referenceRange),
  };
}

const TRAILING_NUMBER_AND_UNIT = /(\d+(?:[.,]\d+)?)\s+([a-zA-Zµμ/%]+(?:\/[a-zA-Zµμ]+)?)$/;
const UNIT_TOKEN = /^[a-zA-Zµμ/%]+(?:\/[a-zA-Zµμ]+)?$/;

/** Splits "14.2 g/dl" into value and unit when the row has no unit column. */
export function splitResultAndUnit(result: string): { result: string; unit: string } {
  const trailing = TRAILING_NUMBER_AND_UNIT.exec(result);
  if (trailing) {
    // Keep anything before the number, such as a "<" or ">" qualifier
    const prefix = result.slice(0, trailing.index);
    return { result: `${prefix}${trailing[1]}`.trim(), unit: trailing[2] };
  }

  const parts = result.split(/\s+/);
  if (parts.length >= 2) {
    const candidate = parts[parts.length - 1];
    if (UNIT_TOKEN.test(candidate)) {
      return { result: parts.slice(0, -1).join(" "), unit: candidate };
    }
  }

  return { result, unit: "" };
}

/** Builds a marker from a validated table row [test, result, unit?, reference?]; null when it cannot form one. */
export function buildMarkerFromRow(row: readonly string[], confidence?: number): Marker | null {
  const testName = row[0]?.trim() ?? "";
  let result = row[1]?.trim() ?? "";
  let unit = row[2]?.trim() ?? "";
  const reference = row[3]?.trim() ?? "";

  if (!unit && result) {
    ({ result, unit } = splitResultAndUnit(result));
  }

  try {
    return createMarker({ test: testName, result, unit, referenceRange: reference, confidence });
  } catch (error) {
    if (error instanceof ValidationError) {
      logger.debug("[marker-builder] Marker validation failed:", error.message);
      return null;
    }
    throw error;
  }
}
