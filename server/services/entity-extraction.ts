import { markerCategorySchema, type Marker, type MarkerCategory } from "@shared/schema";
import { logger } from "../logger";
import type { DocumentLike, EntityLike } from "./document-ai";
import { ValidationError } from "./errors";
import { createMarker, type MarkerFields } from "./marker-builder";
import { resolveTextAnchor } from "./text-anchor";

function entityText(entity: EntityLike, fullText: string): string {
  return resolveTextAnchor(entity.textAnchor, fullText) || (entity.mentionText ?? "").trim();
}

// Trained processors label categories freely ("Clinical Chemistry", "fatty-acids")
function toCategory(label: string): MarkerCategory | undefined {
  const parsed = markerCategorySchema.safeParse(label.trim().toLowerCase().replace(/[\s-]+/g, "_"));
  return parsed.success ? parsed.data : undefined;
}

function entityFields(entity: EntityLike, fullText: string): MarkerFields | null {
  const fields: MarkerFields = { test: "", result: "", confidence: entity.confidence ?? 0 };

  for (const property of entity.properties ?? []) {
    const text = entityText(property, fullText);
    switch (property.type) {
      case "test_name":
        fields.test = text;
        break;
      case "result_value":
        fields.result = text;
        break;
      case "reference_range":
        fields.referenceRange = text;
        break;
      case "unit":
        fields.unit = text;
        break;
      case "category":
        fields.category = toCategory(text);
        break;
    }
  }

  return fields.test ? fields : null;
}

/**
 * Markers labelled by a custom-trained processor: one entity per result row,
 * with test_name / result_value / reference_range / unit / category properties.
 */
export function extractEntityMarkers(document: DocumentLike): Marker[] {
  const fullText = document.text ?? "";
  const markers: Marker[] = [];

  for (const entity of document.entities ?? []) {
    const fields = entityFields(entity, fullText);
    if (!fields) continue;

    try {
      markers.push(createMarker(fields));
    } catch (error) {
      if (!(error instanceof ValidationError)) throw error;
      logger.debug("[entities] Skipping entity:", error.message);
    }
  }

  if (markers.length > 0) {
    logger.info(`[entities] Extracted ${markers.length} markers from processor entities`);
  }
  return markers;
}
