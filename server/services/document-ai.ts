import { DocumentProcessorServiceClient } from "@google-cloud/documentai";
import type { google } from "@google-cloud/documentai/build/protos/protos";
import { createBackoffSettings, RetryOptions, type CallOptions } from "google-gax";
import type { AppConfig, ServiceAccountCredentials } from "../config";
import { logger } from "../logger";
import { ExternalServiceError, toExternalServiceError, TRANSIENT_CODES } from "./errors";

// ==========================================
// DOCUMENT SHAPE
// ==========================================
//
// Document AI output, typed loosely enough that the protobuf IDocument and a
// plain JSON payload both fit. Every level is optional: the layout service
// fills in different parts depending on the processor and the report.

// Offsets arrive as numbers, numeric strings or Long objects
export type SegmentIndex = number | string | { toString(): string } | null;

export interface TextSegmentLike {
  startIndex?: SegmentIndex;
  endIndex?: SegmentIndex;
}

export interface TextAnchorLike {
  textSegments?: TextSegmentLike[] | null;
  content?: string | null;
}

export type TextAnchorInput = string | TextAnchorLike | null | undefined;

export interface LayoutLike {
  textAnchor?: TextAnchorLike | null;
  text?: string | null;
  confidence?: number | null;
}

export interface TableCellLike {
  layout?: LayoutLike | null;
  text?: string | null;
  content?: string | null;
}

export interface TableRowLike {
  cells?: TableCellLike[] | null;
}

export interface TableLike {
  headerRows?: TableRowLike[] | null;
  bodyRows?: TableRowLike[] | null;
  rows?: TableRowLike[] | null;
}

export interface FormFieldLike {
  fieldName?: LayoutLike | string | null;
  fieldValue?: LayoutLike | string | null;
}

export interface PageLike {
  tables?: TableLike[] | null;
  formFields?: FormFieldLike[] | null;
}

export interface EntityLike {
  type?: string | null;
  mentionText?: string | null;
  confidence?: number | null;
  textAnchor?: TextAnchorLike | null;
  properties?: EntityLike[] | null;
}

export interface DocumentLike {
  text?: string | null;
  pages?: PageLike[] | null;
  entities?: EntityLike[] | null;
}

/** Anything that turns PDF bytes into a Document. */
export interface DocumentProcessor {
  readonly processorId: string;
  process(pdfBuffer: Buffer): Promise<DocumentLike>;
}

// ==========================================
// RETRY
// ==========================================

const INITIAL_RETRY_DELAY_MS = 250;
const RETRY_DELAY_MULTIPLIER = 2;
const MAX_RETRY_DELAY_MS = 5000;

/**
 * Call options for processDocument: transient gRPC failures are retried by the
 * client with exponential backoff until the deadline passes.
 */
export function retryCallOptions(deadlineMs: number): CallOptions {
  return {
    retry: new RetryOptions(
      [...TRANSIENT_CODES],
      createBackoffSettings(
        INITIAL_RETRY_DELAY_MS,
        RETRY_DELAY_MULTIPLIER,
        MAX_RETRY_DELAY_MS,
        deadlineMs,
        1,
        deadlineMs,
        deadlineMs
      )
    ),
  };
}

// ==========================================
// SERVICE
// ==========================================

type ProcessResponseTuple = [google.cloud.documentai.v1.IProcessResponse, ...unknown[]];
type ProcessorTuple = [google.cloud.documentai.v1.IProcessor, ...unknown[]];

// The two client calls the service makes; tests substitute a fake
export interface DocumentAIClient {
  processDocument(
    request: google.cloud.documentai.v1.IProcessRequest,
    options?: CallOptions
  ): Promise<ProcessResponseTuple>;
  getProcessor(request: google.cloud.documentai.v1.IGetProcessorRequest): Promise<ProcessorTuple>;
}

export interface DocumentAIConfig {
  projectId: string;
  location: string;
  processorId: string;
  fallbackProcessorId?: string;
  credentials?: ServiceAccountCredentials;
  retryDeadlineMs: number;
  client?: DocumentAIClient;
}

function processorResourceName(projectId: string, location: string, processorId: string): string {
  return `projects/${projectId}/locations/${location}/processors/${processorId}`;
}

function isEnabled(processor: google.cloud.documentai.v1.IProcessor): boolean {
  return processor.state === "ENABLED" || processor.state === 1;
}

export class DocumentAIService implements DocumentProcessor {
  private client: DocumentAIClient;
  private processorName: string;
  private fallbackProcessorName: string | null;
  private activeProcessorName: string;
  private callOptions: CallOptions;

  constructor(config: DocumentAIConfig) {
    this.client = config.client ?? new DocumentProcessorServiceClient({
      credentials: config.credentials,
      apiEndpoint: `${config.location}-documentai.googleapis.com`,
    });

    this.processorName = processorResourceName(config.projectId, config.location, config.processorId);
    this.fallbackProcessorName = config.fallbackProcessorId
      ? processorResourceName(config.projectId, config.location, config.fallbackProcessorId)
      : null;
    this.activeProcessorName = this.processorName;
    this.callOptions = retryCallOptions(config.retryDeadlineMs);
  }

  get processorId(): string {
    return this.activeProcessorName.split("/").pop() ?? this.activeProcessorName;
  }

  /**
   * Picks the first enabled processor, primary before fallback. When neither
   * can be confirmed the primary stays active so the real error surfaces on
   * the first request.
   */
  async resolveActiveProcessor(): Promise<string> {
    const candidates = [this.processorName, this.fallbackProcessorName].filter(
      (name): name is string => name !== null
    );

    for (const name of candidates) {
      try {
        const [processor] = await this.client.getProcessor({ name });
        if (isEnabled(processor)) {
          logger.info(`[document-ai] Using processor ${name}`);
          this.activeProcessorName = name;
          return name;
        }
        logger.warn(`[document-ai] Processor ${name} is not enabled (state: ${processor.state})`);
      } catch (error) {
        logger.warn(`[document-ai] Could not check processor ${name}:`, toExternalServiceError(error).message);
      }
    }

    this.activeProcessorName = this.processorName;
    return this.processorName;
  }

  async processDocument(
    pdfBuffer: Buffer,
    mimeType: string = "application/pdf"
  ): Promise<google.cloud.documentai.v1.IDocument> {
    try {
      return await this.processWith(this.activeProcessorName, pdfBuffer, mimeType);
    } catch (error) {
      const failure = toExternalServiceError(error);
      const fallback = this.fallbackProcessorName;
      if (!failure.notFound || fallback === null || this.activeProcessorName !== this.processorName) {
        throw failure;
      }

      logger.warn("[document-ai] Primary processor not found, switching to fallback");
      this.activeProcessorName = fallback;
      return this.processWith(this.activeProcessorName, pdfBuffer, mimeType);
    }
  }

  process(pdfBuffer: Buffer): Promise<DocumentLike> {
    return this.processDocument(pdfBuffer);
  }

  private async processWith(
    name: string,
    pdfBuffer: Buffer,
    mimeType: string
  ): Promise<google.cloud.documentai.v1.IDocument> {
    const request = {
      name,
      rawDocument: {
        content: pdfBuffer.toString("base64"),
        mimeType,
      },
      imagelessMode: true,
    };

    let result: google.cloud.documentai.v1.IProcessResponse;
    try {
      [result] = await this.client.processDocument(request, this.callOptions);
    } catch (error) {
      throw toExternalServiceError(error);
    }

    if (!result.document) {
      throw new ExternalServiceError("No document returned from Document AI", undefined);
    }

    logger.info(`[document-ai] Processed ${pdfBuffer.length} bytes, ${result.document.pages?.length ?? 0} pages`);
    return result.document;
  }
}

export function createDocumentAIService(config: AppConfig): DocumentAIService | null {
  const { projectId, location, processorId, fallbackProcessorId, credentials, retryDeadlineMs } = config.documentAI;

  if (!projectId || !processorId) {
    logger.warn("[document-ai] Google Document AI processor not configured");
    return null;
  }

  return new DocumentAIService({
    projectId,
    location,
    processorId,
    fallbackProcessorId,
    credentials,
    retryDeadlineMs,
  });
}
