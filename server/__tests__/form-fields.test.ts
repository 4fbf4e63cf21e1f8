import { describe, expect, it } from "vitest";
import { extractFormFields, mapFormField } from "../services/form-fields";
import { createEmptyResult } from "../services/result-aggregator";

describe("mapFormField", () => {
  it.each([
    ["Patientenname", { section: "patient_info", field: "name" }],
    ["Geburtsdatum", { section: "patient_info", field: "birth_date_gender" }],
    ["Tagebuchnummer", { section: "patient_info", field: "diary_number" }],
    ["Eingangsdatum", { section: "patient_info", field: "entry_date" }],
    ["Ärztliche Leitung", { section: "header", field: "medical_director" }],
    ["Entnahmezeit", { section: "header", field: "collection_date" }],
    ["Uhrzeit", { section: "header", field: "collection_time" }],
  ])("maps %s", (fieldName, target) => {
    expect(mapFormField(createEmptyResult(), fieldName, "value")).toEqual(target);
  });

  it("writes the value to the mapped field", () => {
    const result = createEmptyResult();
    mapFormField(result, "Telefon", "0123 456");
    expect(result.header.contact).toBe("0123 456");
  });

  it("ignores unknown field names", () => {
    const result = createEmptyResult();
    expect(mapFormField(result, "Laborwert", "5")).toBeNull();
    expect(result.header).toEqual(createEmptyResult().header);
    expect(result.patient_info).toEqual(createEmptyResult().patient_info);
  });
});

describe("extractFormFields", () => {
  it("resolves anchored names and values against the document text", () => {
    const result = createEmptyResult();
    const document = {
      text: "Name: Max Mustermann",
      pages: [{
        formFields: [{
          fieldName: { textAnchor: { textSegments: [{ startIndex: 0, endIndex: 4 }] } },
          fieldValue: { textAnchor: { textSegments: [{ startIndex: 6, endIndex: 20 }] } },
        }],
      }],
    };

    expect(extractFormFields(document, result)).toBe(1);
    expect(result.patient_info.name).toBe("Max Mustermann");
  });

  it("skips fields with an empty value", () => {
    const result = createEmptyResult();
    const document = {
      pages: [{ formFields: [{ fieldName: "Telefon", fieldValue: "" }, { fieldName: "Kasse", fieldValue: "AOK" }] }],
    };

    expect(extractFormFields(document, result)).toBe(1);
    expect(result.header.contact).toBe("");
    expect(result.header.insurance).toBe("AOK");
  });
});
