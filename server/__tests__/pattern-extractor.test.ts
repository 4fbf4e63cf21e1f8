import { describe, expect, it } from "vitest";
import { extractMarkersFromText, isValidTestName } from "../services/pattern-extractor";

describe("isValidTestName", () => {
  it("accepts known medical terms", () => {
    expect(isValidTestName("Vitamin D3")).toBe(true);
  });

  it("rejects address and page vocabulary", () => {
    expect(isValidTestName("Musterstraße")).toBe(false);
    expect(isValidTestName("Telefonnummer")).toBe(false);
  });

  it("lets a medical term win over page vocabulary", () => {
    expect(isValidTestName("Zink Seite")).toBe(true);
  });

  it("rejects names that are too short", () => {
    expect(isValidTestName("Ab")).toBe(false);
  });
});

describe("extractMarkersFromText", () => {
  const text = [
    "Hämoglobin 14,2 g/dl (13.5-17.5)",
    "Ferritin: 120 ng/ml",
    "TSH\t2,1\tmU/l",
    "Seite 1 von 2",
  ].join("\n");

  it("recovers markers from every line template", () => {
    expect(extractMarkersFromText(text)).toEqual([
      {
        test: "Hämoglobin",
        result: "14.2",
        unit: "g/dl",
        reference_range: "13.5-17.5",
        category: "hematology",
        confidence: 0,
        is_critical: false,
      },
      {
        test: "TSH",
        result: "2.1",
        unit: "mU/l",
        reference_range: "",
        category: "hormones",
        confidence: 0,
        is_critical: false,
      },
      {
        test: "Ferritin",
        result: "120",
        unit: "ng/ml",
        reference_range: "",
        category: "clinical_chemistry",
        confidence: 0,
        is_critical: false,
      },
    ]);
  });

  it("takes each test name once", () => {
    const markers = extractMarkersFromText("Ferritin: 120 ng/ml\nFerritin: 95 ng/ml");
    expect(markers.map((m) => m.result)).toEqual(["120"]);
  });

  it("returns nothing for empty text", () => {
    expect(extractMarkersFromText("")).toEqual([]);
  });
});
