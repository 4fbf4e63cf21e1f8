import { describe, expect, it } from "vitest";
import { extractCellText, extractTableRows } from "../services/table-rows";
import { tableFromRows } from "./helpers";

const FULL_TEXT = "Hämoglobin 14,2 g/dl";

describe("extractCellText", () => {
  it("resolves the layout anchor first", () => {
    const cell = {
      layout: { textAnchor: { textSegments: [{ startIndex: 0, endIndex: 10 }] }, text: "other" },
      text: "other",
    };
    expect(extractCellText(cell, FULL_TEXT)).toBe("Hämoglobin");
  });

  it("falls back through cell text, content and layout text", () => {
    expect(extractCellText({ text: " 14,2 " }, FULL_TEXT)).toBe("14,2");
    expect(extractCellText({ content: "g/dl" }, FULL_TEXT)).toBe("g/dl");
    expect(extractCellText({ layout: { text: "13.5-17.5" } }, FULL_TEXT)).toBe("13.5-17.5");
  });

  it("returns empty text for a cell with nothing readable", () => {
    expect(extractCellText({}, FULL_TEXT)).toBe("");
  });
});

describe("extractTableRows", () => {
  it("reads body rows", () => {
    const table = tableFromRows([["Hämoglobin", "14,2", "g/dl"], ["Ferritin", "120", "ng/ml"]]);
    expect(extractTableRows(table, FULL_TEXT)).toEqual([
      ["Hämoglobin", "14,2", "g/dl"],
      ["Ferritin", "120", "ng/ml"],
    ]);
  });

  it("drops rows whose cells are all empty", () => {
    const table = tableFromRows([["", " "], ["TSH", "2,1"]]);
    expect(extractTableRows(table, FULL_TEXT)).toEqual([["TSH", "2,1"]]);
  });

  it("falls back to header rows when the body yields nothing", () => {
    const table = {
      headerRows: [{ cells: [{ text: "Test" }, { text: "Ergebnis" }] }],
      bodyRows: [{ cells: [{ text: "" }, { text: "" }] }],
    };
    expect(extractTableRows(table, FULL_TEXT)).toEqual([["Test", "Ergebnis"]]);
  });

  it("reads the generic rows field last", () => {
    const table = { rows: [{ cells: [{ text: "Zink" }, { text: "950" }] }] };
    expect(extractTableRows(table, FULL_TEXT)).toEqual([["Zink", "950"]]);
  });

  it("skips rows without cells", () => {
    const table = { bodyRows: [{ cells: null }, { cells: [{ text: "CRP" }, { text: "0,4" }] }] };
    expect(extractTableRows(table, FULL_TEXT)).toEqual([["CRP", "0,4"]]);
  });

  it("returns no rows for an empty table", () => {
    expect(extractTableRows({}, FULL_TEXT)).toEqual([]);
  });
});
