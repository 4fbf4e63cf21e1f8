import { Status } from "google-gax";

export type ExtractionStage = "entities" | "tables" | "patterns" | "form_fields";

export type PostProcessingStage =
  | "deduplicate"
  | "sort"
  | "reference_validation"
  | "confidence"
  | "validation_status";

export type PipelineStage = ExtractionStage | PostProcessingStage | "ocr";

/** Marker inputs that cannot form a marker. Always recovered where it is raised. */
export class ValidationError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ValidationError";
  }
}

/** A failure inside one pipeline stage. */
export class ProcessingError extends Error {
  readonly stage: PipelineStage;

  constructor(stage: PipelineStage, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ProcessingError";
    this.stage = stage;
  }
}

// gRPC codes worth another attempt within the retry deadline
export const TRANSIENT_CODES: ReadonlySet<Status> = new Set([
  Status.UNAVAILABLE,
  Status.DEADLINE_EXCEEDED,
  Status.INTERNAL,
  Status.ABORTED,
  Status.UNKNOWN,
]);

export class ExternalServiceError extends Error {
  readonly code: Status | undefined;
  readonly transient: boolean;

  constructor(message: string, code: Status | undefined, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ExternalServiceError";
    this.code = code;
    this.transient = code !== undefined && TRANSIENT_CODES.has(code);
  }

  get notFound(): boolean {
    return this.code === Status.NOT_FOUND;
  }
}

function isStatus(value: number): value is Status {
  return Object.values(Status).some((status) => status === value);
}

function grpcCode(error: unknown): Status | undefined {
  if (typeof error === "object" && error !== null && "code" in error && typeof error.code === "number") {
    return isStatus(error.code) ? error.code : undefined;
  }
  return undefined;
}

export function toExternalServiceError(error: unknown): ExternalServiceError {
  if (error instanceof ExternalServiceError) return error;
  const message = error instanceof Error ? error.message : String(error);
  return new ExternalServiceError(message, grpcCode(error), { cause: error });
}
