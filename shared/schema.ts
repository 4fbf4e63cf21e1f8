import { z } from "zod";

// ==========================================
// MARKER CATEGORIES
// ==========================================

// Declaration order is the classification order: the first category that
// matches a marker name wins.
export const markerCategories = [
  "hematology",
  "clinical_chemistry",
  "hormones",
  "clinical_immunology",
  "metals_trace_elements",
  "micronutrients",
  "fatty_acids",
  "quotients",
] as const;

export type MarkerCategory = typeof markerCategories[number];

export const markerCategorySchema = z.enum(markerCategories);

// Categories stored as a flat marker list on the result
export type ListCategory = Exclude<MarkerCategory, "fatty_acids">;

export const listCategories = markerCategories.filter(
  (category): category is ListCategory => category !== "fatty_acids"
);

export const fattyAcidSubcategories = [
  "omega_3",
  "omega_6",
  "monounsaturated",
  "trans",
  "saturated",
] as const;

export type FattyAcidSubcategory = typeof fattyAcidSubcategories[number];

export type FattyAcidGroupKey = `${FattyAcidSubcategory}_fatty_acids`;

export function fattyAcidGroupKey(subcategory: FattyAcidSubcategory): FattyAcidGroupKey {
  return `${subcategory}_fatty_acids`;
}

// ==========================================
// MARKERS
// ==========================================

export interface Marker {
  readonly test: string;
  readonly result: string;
  readonly unit: string;
  readonly reference_range: string;
  readonly category: MarkerCategory;
  readonly confidence: number;
  readonly is_critical: boolean;
}

export type FattyAcidGroups = Record<FattyAcidGroupKey, Marker[]>;

// ==========================================
// RESULT RECORD
// ==========================================

export interface ReportHeader {
  medical_director: string;
  scientists: string;
  address: string;
  contact: string;
  insurance: string;
  collection_date: string;
  collection_time: string;
}

export interface PatientInfo {
  name: string;
  diary_number: string;
  birth_date_gender: string;
  entry_date: string;
  exit_date: string;
}

export const validationStatuses = [
  "pending",
  "success",
  "warning: low marker count",
  "warning: low confidence",
  "validation failed",
] as const;

export type ValidationStatus = typeof validationStatuses[number];

export interface ExtractionStats {
  total_markers_found: number;
  markers_with_reference: number;
  markers_without_reference: number;
  critical_values: string[];
  extraction_confidence: number;
  validation_status: ValidationStatus;
}

export type ParseResult = {
  header: ReportHeader;
  patient_info: PatientInfo;
  fatty_acids: FattyAcidGroups;
  extraction_stats: ExtractionStats;
} & Record<ListCategory, Marker[]>;

export interface ProcessingMetadata {
  processing_time: number;
  processor_id: string;
  document_pages: number;
}

export type ParseSuccessResponse = ParseResult & {
  status: "success";
  message: string;
  filename: string;
  processing_metadata: ProcessingMetadata;
};

export interface ParseErrorResponse {
  status: "error";
  message: string;
  filename: string;
  data: null;
}

export type ParseResponse = ParseSuccessResponse | ParseErrorResponse;

// ==========================================
// WEBHOOK REQUEST
// ==========================================

export const DEFAULT_FILENAME = "medical_report.pdf";

export const parseRequestSchema = z.object({
  pdf_base64: z.string({ required_error: "Missing required field: pdf_base64" })
    .min(1, "Missing required field: pdf_base64"),
  filename: z.string().trim().min(1).optional(),
});

// Whitespace is dropped before validation: mail gateways wrap base64 at 76 columns.
export const pdfBase64Schema = z.string()
  .transform((value) => value.replace(/\s+/g, ""))
  .pipe(z.string().min(1, "PDF payload is empty").base64("PDF payload is not valid base64"));
