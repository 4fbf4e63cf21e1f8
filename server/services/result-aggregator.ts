import {
  fattyAcidGroupKey,
  fattyAcidSubcategories,
  listCategories,
  type Marker,
  type ParseResult,
  type ValidationStatus,
} from "@shared/schema";
import { logger } from "../logger";
import { classifyFattyAcid } from "./classifier";
import type { ReferenceCatalog } from "./reference-catalog";
import { failedStages, runStage, type StageFailure, type StageOutcome } from "./stages";

export const MIN_MARKER_COUNT = 5;
export const MIN_CONFIDENCE = 50;

export function createEmptyResult(): ParseResult {
  return {
    header: {
      medical_director: "",
      scientists: "",
      address: "",
      contact: "",
      insurance: "",
      collection_date: "",
      collection_time: "",
    },
    patient_info: {
      name: "",
      diary_number: "",
      birth_date_gender: "",
      entry_date: "",
      exit_date: "",
    },
    hematology: [],
    clinical_chemistry: [],
    hormones: [],
    clinical_immunology: [],
    metals_trace_elements: [],
    micronutrients: [],
    fatty_acids: {
      omega_3_fatty_acids: [],
      omega_6_fatty_acids: [],
      monounsaturated_fatty_acids: [],
      trans_fatty_acids: [],
      saturated_fatty_acids: [],
    },
    quotients: [],
    extraction_stats: {
      total_markers_found: 0,
      markers_with_reference: 0,
      markers_without_reference: 0,
      critical_values: [],
      extraction_confidence: 0,
      validation_status: "pending",
    },
  };
}

function targetList(result: ParseResult, marker: Marker): Marker[] {
  if (marker.category === "fatty_acids") {
    return result.fatty_acids[fattyAcidGroupKey(classifyFattyAcid(marker.test))];
  }
  return result[marker.category];
}

/** Every marker list of the result, fatty-acid subgroups included. */
export function markerLists(result: ParseResult): Marker[][] {
  return [
    ...listCategories.map((category) => result[category]),
    ...fattyAcidSubcategories.map((subcategory) => result.fatty_acids[fattyAcidGroupKey(subcategory)]),
  ];
}

/**
 * Files a marker under its category. A marker whose name (case-insensitive) is
 * already in that list is skipped and not counted.
 */
export function addMarker(result: ParseResult, marker: Marker): boolean {
  const list = targetList(result, marker);
  const key = marker.test.toLowerCase();
  if (list.some((existing) => existing.test.toLowerCase() === key)) {
    logger.debug(`[aggregator] Skipping duplicate marker "${marker.test}"`);
    return false;
  }

  list.push(marker);
  result.extraction_stats.total_markers_found += 1;
  if (marker.is_critical) {
    result.extraction_stats.critical_values.push(marker.test);
  }
  return true;
}

export function markerCompleteness(marker: Pick<Marker, "test" | "result" | "unit" | "reference_range">): number {
  let score = 0;
  if (marker.test) score += 1;
  if (marker.result) score += 2;
  if (marker.unit) score += 1;
  if (marker.reference_range) score += 1;
  return score;
}

/**
 * Keeps one marker per lowercased name: the most complete one, in the position
 * of the first occurrence. Equal scores keep the earlier marker.
 */
export function removeDuplicateMarkers(markers: readonly Marker[]): Marker[] {
  const unique: Marker[] = [];
  const indexByName = new Map<string, number>();

  for (const marker of markers) {
    const key = marker.test.toLowerCase();
    const index = indexByName.get(key);
    if (index === undefined) {
      indexByName.set(key, unique.length);
      unique.push(marker);
    } else if (markerCompleteness(marker) > markerCompleteness(unique[index])) {
      unique[index] = marker;
    }
  }

  return unique;
}

function compareTestNames(a: Marker, b: Marker): number {
  if (a.test < b.test) return -1;
  if (a.test > b.test) return 1;
  return 0;
}

export function sortMarkers(markers: readonly Marker[]): Marker[] {
  return [...markers].sort(compareTestNames);
}

function replaceContents(list: Marker[], next: Marker[]): void {
  list.splice(0, list.length, ...next);
}

export function countMarkers(result: ParseResult): number {
  return markerLists(result).reduce((total, list) => total + list.length, 0);
}

/** Share of markers found in the reference catalog, as a percentage with two decimals. */
export function calculateConfidence(totalMarkers: number, markersWithReference: number): number {
  if (totalMarkers <= 0) return 0;
  const confidence = (markersWithReference * 100) / totalMarkers;
  return Math.round(confidence * 100) / 100;
}

export function deriveValidationStatus(totalMarkers: number, confidence: number): ValidationStatus {
  if (totalMarkers < MIN_MARKER_COUNT) return "warning: low marker count";
  if (confidence < MIN_CONFIDENCE) return "warning: low confidence";
  return "success";
}

/**
 * Counts extracted marker names present in the catalog. Returns false without
 * touching the stats when no catalog is loaded.
 */
export function validateAgainstReference(result: ParseResult, catalog: ReferenceCatalog): boolean {
  if (catalog.size === 0) {
    logger.info("[aggregator] No reference markers available for validation");
    return false;
  }

  const extracted = new Set(
    markerLists(result).flatMap((list) => list.map((marker) => marker.test.toLowerCase()))
  );

  let withReference = 0;
  for (const name of extracted) {
    if (catalog.has(name)) withReference += 1;
  }

  result.extraction_stats.markers_with_reference = withReference;
  result.extraction_stats.markers_without_reference = extracted.size - withReference;
  return true;
}

/**
 * Final pass over the aggregated result. Every step is isolated; the returned
 * failures name the steps that threw.
 */
export function postProcessResult(result: ParseResult, catalog: ReferenceCatalog): StageFailure[] {
  const stats = result.extraction_stats;
  const outcomes: StageOutcome[] = [];
  let referenceChecked = false;

  outcomes.push(runStage("deduplicate", () => {
    for (const list of markerLists(result)) {
      replaceContents(list, removeDuplicateMarkers(list));
    }
    stats.total_markers_found = countMarkers(result);
  }));

  outcomes.push(runStage("sort", () => {
    for (const list of markerLists(result)) {
      replaceContents(list, sortMarkers(list));
    }
  }));

  const reference = runStage("reference_validation", () => {
    referenceChecked = validateAgainstReference(result, catalog);
  });
  outcomes.push(reference);
  if (!reference.ok) {
    stats.validation_status = "validation failed";
  }

  outcomes.push(runStage("confidence", () => {
    stats.extraction_confidence = calculateConfidence(stats.total_markers_found, stats.markers_with_reference);
  }));

  if (referenceChecked) {
    outcomes.push(runStage("validation_status", () => {
      stats.validation_status = deriveValidationStatus(stats.total_markers_found, stats.extraction_confidence);
    }));
  }

  return failedStages(outcomes);
}
