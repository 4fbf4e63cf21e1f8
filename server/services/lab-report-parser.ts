import {
  DEFAULT_FILENAME,
  pdfBase64Schema,
  type ParseErrorResponse,
  type ParseResponse,
  type ParseResult,
  type ProcessingMetadata,
} from "@shared/schema";
import { logger, errorMessage } from "../logger";
import type { DocumentLike, DocumentProcessor } from "./document-ai";
import { extractEntityMarkers } from "./entity-extraction";
import { ProcessingError, ValidationError } from "./errors";
import { extractFormFields } from "./form-fields";
import { buildMarkerFromRow, isValidMarkerRow } from "./marker-builder";
import { extractMarkersFromText } from "./pattern-extractor";
import { createPDFProcessorService, type PDFProcessorService } from "./pdf-processor";
import { EMPTY_CATALOG, type ReferenceCatalog } from "./reference-catalog";
import { addMarker, createEmptyResult, postProcessResult } from "./result-aggregator";
import { failedStages, runStage, type StageFailure, type StageOutcome } from "./stages";
import { extractTableRows } from "./table-rows";

export interface LabReportParserOptions {
  processor: DocumentProcessor;
  referenceCatalog?: ReferenceCatalog;
  pdfProcessor?: PDFProcessorService;
  maxPagesPerRequest?: number;
}

export interface ExtractionOutcome {
  result: ParseResult;
  failedStages: StageFailure[];
}

export interface ProcessedReport extends ExtractionOutcome {
  metadata: ProcessingMetadata;
}

/** @throws ValidationError when the payload is empty or not base64 */
export function decodePdfBase64(pdfBase64: string): Buffer {
  const parsed = pdfBase64Schema.safeParse(pdfBase64);
  if (!parsed.success) {
    throw new ValidationError(parsed.error.issues[0]?.message ?? "Invalid base64 payload");
  }
  return Buffer.from(parsed.data, "base64");
}

function errorResponse(message: string, filename: string): ParseErrorResponse {
  return { status: "error", message, filename, data: null };
}

export class LabReportParser {
  private processor: DocumentProcessor;
  private catalog: ReferenceCatalog;
  private pdfProcessor: PDFProcessorService;
  private maxPagesPerRequest: number;

  constructor(options: LabReportParserOptions) {
    this.processor = options.processor;
    this.catalog = options.referenceCatalog ?? EMPTY_CATALOG;
    this.pdfProcessor = options.pdfProcessor ?? createPDFProcessorService();
    this.maxPagesPerRequest = options.maxPagesPerRequest ?? 15;
  }

  get processorId(): string {
    return this.processor.processorId;
  }

  get referenceMarkerCount(): number {
    return this.catalog.size;
  }

  /**
   * Runs every extraction strategy over each document into one result, then
   * post-processes it once. No strategy can stop the others.
   */
  extract(...documents: DocumentLike[]): ExtractionOutcome {
    const result = createEmptyResult();
    const outcomes: StageOutcome[] = [];

    for (const document of documents) {
      const fullText = document.text ?? "";

      outcomes.push(runStage("entities", () => {
        for (const marker of extractEntityMarkers(document)) addMarker(result, marker);
      }));
      outcomes.push(runStage("tables", () => this.extractTables(document, result)));
      outcomes.push(runStage("patterns", () => {
        for (const marker of extractMarkersFromText(fullText)) addMarker(result, marker);
      }));
      outcomes.push(runStage("form_fields", () => {
        extractFormFields(document, result);
      }));
    }

    return {
      result,
      failedStages: [...failedStages(outcomes), ...postProcessResult(result, this.catalog)],
    };
  }

  private extractTables(document: DocumentLike, result: ParseResult): void {
    const fullText = document.text ?? "";
    const pages = document.pages ?? [];
    if (pages.length === 0) {
      logger.warn("[table-extraction] Document has no pages");
      return;
    }

    pages.forEach((page, pageIndex) => {
      (page.tables ?? []).forEach((table, tableIndex) => {
        const label = `table ${tableIndex + 1} on page ${pageIndex + 1}`;
        try {
          const rows = extractTableRows(table, fullText);
          let added = 0;
          for (const row of rows) {
            if (!isValidMarkerRow(row)) continue;
            const marker = buildMarkerFromRow(row);
            if (marker && addMarker(result, marker)) added += 1;
          }
          logger.info(`[table-extraction] ${label}: ${rows.length} rows, ${added} markers`);
        } catch (error) {
          logger.error(`[table-extraction] Error processing ${label}:`, errorMessage(error));
        }
      });
    });
  }

  /**
   * Sends the PDF to the document processor (in page batches when it is long)
   * and extracts the report from the returned documents.
   * @throws ValidationError when the bytes are not a PDF
   * @throws ProcessingError when the processor call fails
   */
  async processDocument(pdfBuffer: Buffer): Promise<ProcessedReport> {
    const batches = await this.pdfProcessor.splitIntoBatches(pdfBuffer, this.maxPagesPerRequest);
    const documents: DocumentLike[] = [];
    let processingTime = 0;

    for (const batch of batches) {
      if (batches.length > 1) {
        logger.info(`[parser] Processing pages ${batch.startPage}-${batch.endPage} of a ${batches.length}-batch document`);
      }

      const startedAt = Date.now();
      try {
        documents.push(await this.processor.process(batch.buffer));
      } catch (error) {
        throw new ProcessingError("ocr", `Document AI processing failed: ${errorMessage(error)}`, { cause: error });
      }
      processingTime += (Date.now() - startedAt) / 1000;
    }

    const outcome = this.extract(...documents);
    const documentPages = documents.reduce((total, document) => total + (document.pages?.length ?? 0), 0);

    return {
      ...outcome,
      metadata: {
        processing_time: Math.round(processingTime * 1000) / 1000,
        processor_id: this.processor.processorId,
        document_pages: documentPages,
      },
    };
  }

  /** Entry point for the webhook: always resolves to a response with an explicit status. */
  async processForWebhook(pdfBase64: string, filename: string = DEFAULT_FILENAME): Promise<ParseResponse> {
    let pdfBuffer: Buffer;
    try {
      pdfBuffer = decodePdfBase64(pdfBase64);
      logger.info(`[parser] Decoded PDF ${filename}: ${pdfBuffer.length} bytes`);
    } catch (error) {
      logger.error("[parser] Base64 decode error:", errorMessage(error));
      return errorResponse(`Invalid base64 PDF data: ${errorMessage(error)}`, filename);
    }

    try {
      const report = await this.processDocument(pdfBuffer);
      const stats = report.result.extraction_stats;
      logger.info(
        `[parser] Processing successful: ${stats.total_markers_found} markers found (${stats.validation_status})`
      );
      if (report.failedStages.length > 0) {
        logger.warn(`[parser] Stages with errors: ${report.failedStages.map((failure) => failure.stage).join(", ")}`);
      }

      return {
        status: "success",
        message: "Document processed successfully",
        filename,
        ...report.result,
        processing_metadata: report.metadata,
      };
    } catch (error) {
      logger.error("[parser] Document processing error:", errorMessage(error));
      return errorResponse(`Document processing failed: ${errorMessage(error)}`, filename);
    }
  }
}
