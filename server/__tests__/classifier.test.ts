import { describe, expect, it } from "vitest";
import { classifyFattyAcid, classifyMarker } from "../services/classifier";

describe("classifyMarker", () => {
  it.each([
    ["Hämoglobin", "hematology"],
    ["Leukozyten", "hematology"],
    ["Ferritin", "clinical_chemistry"],
    ["Calcium", "clinical_chemistry"],
    ["TSH", "hormones"],
    ["CRP", "clinical_immunology"],
    ["Zink", "metals_trace_elements"],
    ["Eisen (Fe)", "metals_trace_elements"],
    ["Eisen", "metals_trace_elements"],
    ["Phosphat", "metals_trace_elements"],
    ["Vitamin D3", "micronutrients"],
    ["Folsäure", "micronutrients"],
    ["Omega-3-Index", "fatty_acids"],
    ["Palmitinsäure", "fatty_acids"],
    ["LDL/HDL-Quotient", "quotients"],
  ])("files %s under %s", (name, category) => {
    expect(classifyMarker(name)).toBe(category);
  });

  it("does not read a vitamin letter as an element symbol", () => {
    expect(classifyMarker("Vitamin K")).toBe("micronutrients");
  });

  it("falls back to clinical chemistry", () => {
    expect(classifyMarker("Unbekannt")).toBe("clinical_chemistry");
  });
});

describe("classifyFattyAcid", () => {
  it.each([
    ["EPA", "omega_3"],
    ["Arachidonsäure", "omega_6"],
    ["Palmitoleinsäure", "monounsaturated"],
    ["Nervonsäure", "monounsaturated"],
    ["Elaidinsäure", "trans"],
    ["Stearinsäure", "saturated"],
    ["Palmitinsäure", "saturated"],
  ])("files %s under %s", (name, subcategory) => {
    expect(classifyFattyAcid(name)).toBe(subcategory);
  });

  it("defaults to omega-3", () => {
    expect(classifyFattyAcid("Ölsäure")).toBe("omega_3");
  });
});
