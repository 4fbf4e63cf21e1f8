import type { ParseResult, PatientInfo, ReportHeader } from "@shared/schema";
import { logger, errorMessage } from "../logger";
import type { DocumentLike } from "./document-ai";
import { resolveLayoutText } from "./text-anchor";

type FieldTarget =
  | { section: "patient_info"; field: keyof PatientInfo }
  | { section: "header"; field: keyof ReportHeader };

interface FieldMapping {
  keywords: readonly string[];
  target: FieldTarget;
}

// Patient groups are checked before header groups; within each, top to bottom
export const FIELD_MAPPINGS: readonly FieldMapping[] = [
  { keywords: ["name", "patient"], target: { section: "patient_info", field: "name" } },
  { keywords: ["geboren", "birth", "geburt"], target: { section: "patient_info", field: "birth_date_gender" } },
  { keywords: ["tagebuch", "diary", "nummer"], target: { section: "patient_info", field: "diary_number" } },
  { keywords: ["eingang", "entry", "received"], target: { section: "patient_info", field: "entry_date" } },
  { keywords: ["ausgang", "exit", "report"], target: { section: "patient_info", field: "exit_date" } },
  { keywords: ["direktor", "director", "leitung"], target: { section: "header", field: "medical_director" } },
  { keywords: ["wissenschaft", "scientist"], target: { section: "header", field: "scientists" } },
  { keywords: ["adresse", "address", "straße"], target: { section: "header", field: "address" } },
  { keywords: ["telefon", "phone", "contact"], target: { section: "header", field: "contact" } },
  { keywords: ["versicher", "insurance", "kasse"], target: { section: "header", field: "insurance" } },
  { keywords: ["entnahme", "collection", "datum"], target: { section: "header", field: "collection_date" } },
  { keywords: ["uhrzeit", "time", "zeit"], target: { section: "header", field: "collection_time" } },
];

/** Writes a form value to the first matching destination. Returns that destination, or null. */
export function mapFormField(result: ParseResult, fieldName: string, fieldValue: string): FieldTarget | null {
  const lower = fieldName.toLowerCase();
  const mapping = FIELD_MAPPINGS.find(({ keywords }) => keywords.some((keyword) => lower.includes(keyword)));
  if (!mapping) return null;

  const { target } = mapping;
  if (target.section === "patient_info") {
    result.patient_info[target.field] = fieldValue;
  } else {
    result.header[target.field] = fieldValue;
  }
  return target;
}

export function extractFormFields(document: DocumentLike, result: ParseResult): number {
  const fullText = document.text ?? "";
  let mapped = 0;

  for (const page of document.pages ?? []) {
    for (const formField of page.formFields ?? []) {
      try {
        const name = resolveLayoutText(formField.fieldName, fullText);
        const value = resolveLayoutText(formField.fieldValue, fullText);
        if (name && value && mapFormField(result, name, value)) {
          mapped += 1;
        }
      } catch (error) {
        logger.debug("[form-fields] Form field extraction error:", errorMessage(error));
      }
    }
  }

  logger.info(`[form-fields] Mapped ${mapped} form fields`);
  return mapped;
}
