import { logger, errorMessage } from "../logger";
import type { TableCellLike, TableLike, TableRowLike } from "./document-ai";
import { resolveTextAnchor } from "./text-anchor";

interface RowSource {
  name: string;
  rows: (table: TableLike) => TableRowLike[] | null;
}

// Tried in order; the first source producing a non-empty row wins
const ROW_SOURCES: readonly RowSource[] = [
  {
    name: "body_rows",
    rows: (table) => (table.bodyRows?.length ? table.bodyRows : null),
  },
  {
    name: "header_and_body_rows",
    rows: (table) => {
      const combined = [...(table.headerRows ?? []), ...(table.bodyRows ?? [])];
      return combined.length ? combined : null;
    },
  },
  {
    name: "rows",
    rows: (table) => (table.rows?.length ? table.rows : null),
  },
];

type CellTextSource = (cell: TableCellLike, fullText: string) => string | null | undefined;

const CELL_TEXT_SOURCES: readonly CellTextSource[] = [
  (cell, fullText) => resolveTextAnchor(cell.layout?.textAnchor, fullText),
  (cell) => cell.text,
  (cell) => cell.content,
  (cell) => cell.layout?.text,
];

export function extractCellText(cell: TableCellLike, fullText: string): string {
  for (const source of CELL_TEXT_SOURCES) {
    try {
      const text = source(cell, fullText);
      if (typeof text === "string" && text.trim()) {
        return text.trim();
      }
    } catch (error) {
      logger.debug("[table-extraction] Cell text source failed:", errorMessage(error));
    }
  }
  return "";
}

function readRows(rows: TableRowLike[], fullText: string): string[][] {
  const extracted: string[][] = [];
  for (const row of rows) {
    if (!row.cells?.length) continue;
    const cells = row.cells.map((cell) => extractCellText(cell, fullText));
    if (cells.some((cell) => cell.trim())) {
      extracted.push(cells);
    }
  }
  return extracted;
}

/**
 * Reads a table as rows of cell strings, trying each known row layout until one
 * yields data. An empty array means the caller should fall back to text patterns.
 */
export function extractTableRows(table: TableLike, fullText: string): string[][] {
  for (const source of ROW_SOURCES) {
    try {
      const rows = source.rows(table);
      if (!rows) continue;

      const extracted = readRows(rows, fullText);
      logger.debug(`[table-extraction] ${source.name}: extracted ${extracted.length} rows`);
      if (extracted.length > 0) return extracted;
    } catch (error) {
      logger.debug(`[table-extraction] ${source.name} failed:`, errorMessage(error));
    }
  }

  logger.warn("[table-extraction] All table extraction methods came back empty");
  return [];
}
