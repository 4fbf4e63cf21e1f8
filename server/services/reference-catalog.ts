import { promises as fs } from "fs";
import { logger } from "../logger";

export interface ReferenceMarker {
  originalName: string;
  unit: string;
  optimalRange: string;
  veryLow: string;
  low: string;
  optimal: string;
  high: string;
  tooHigh: string;
}

/** Lowercased marker name -> reference entry. Loaded once, read-only afterwards. */
export type ReferenceCatalog = ReadonlyMap<string, ReferenceMarker>;

export const EMPTY_CATALOG: ReferenceCatalog = new Map();

// Minimal RFC 4180 reader: quoted fields, doubled quotes, CRLF or LF line ends
export function parseCsv(text: string): string[][] {
  const rows: string[][] = [];
  let row: string[] = [];
  let field = "";
  let inQuotes = false;

  for (let i = 0; i < text.length; i++) {
    const char = text[i];

    if (inQuotes) {
      if (char === '"' && text[i + 1] === '"') {
        field += '"';
        i++;
      } else if (char === '"') {
        inQuotes = false;
      } else {
        field += char;
      }
      continue;
    }

    if (char === '"') {
      inQuotes = true;
    } else if (char === ",") {
      row.push(field);
      field = "";
    } else if (char === "\n" || char === "\r") {
      if (char === "\r" && text[i + 1] === "\n") i++;
      row.push(field);
      rows.push(row);
      row = [];
      field = "";
    } else {
      field += char;
    }
  }

  if (field || row.length > 0) {
    row.push(field);
    rows.push(row);
  }

  return rows.filter((cells) => cells.some((cell) => cell.trim()));
}

const COLUMNS = {
  name: "Markername",
  unit: "Unit",
  optimalRange: "Optimalbereich",
  veryLow: "very low",
  low: "low",
  optimal: "optimal",
  high: "high",
  tooHigh: "too high",
} as const;

export function parseReferenceCatalog(csvText: string): ReferenceCatalog {
  const [header, ...records] = parseCsv(csvText.replace(/^\uFEFF/, ""));
  if (!header) return EMPTY_CATALOG;

  const columnIndex = new Map(header.map((title, index): [string, number] => [title.trim(), index]));
  const cell = (record: string[], column: string): string => {
    const index = columnIndex.get(column);
    return index === undefined ? "" : (record[index] ?? "").trim();
  };

  const catalog = new Map<string, ReferenceMarker>();
  for (const record of records) {
    const originalName = cell(record, COLUMNS.name);
    if (!originalName) continue;

    catalog.set(originalName.toLowerCase(), {
      originalName,
      unit: cell(record, COLUMNS.unit),
      optimalRange: cell(record, COLUMNS.optimalRange),
      veryLow: cell(record, COLUMNS.veryLow),
      low: cell(record, COLUMNS.low),
      optimal: cell(record, COLUMNS.optimal),
      high: cell(record, COLUMNS.high),
      tooHigh: cell(record, COLUMNS.tooHigh),
    });
  }

  return catalog;
}

/**
 * Reads the reference values file. A missing or unreadable file is not fatal:
 * the parser then skips reference validation.
 */
export async function loadReferenceCatalog(filePath: string): Promise<ReferenceCatalog> {
  try {
    const catalog = parseReferenceCatalog(await fs.readFile(filePath, "utf-8"));
    logger.info(`[reference-catalog] Loaded ${catalog.size} reference markers from ${filePath}`);
    return catalog;
  } catch (error) {
    logger.warn(`[reference-catalog] Could not load ${filePath}, continuing without reference data:`, error);
    return EMPTY_CATALOG;
  }
}
