import { PDFDocument } from "pdf-lib";
import { ValidationError } from "./errors";

export interface PDFBatch {
  buffer: Buffer;
  startPage: number;
  endPage: number;
  pageCount: number;
}

export class PDFProcessorService {
  private async load(pdfBuffer: Buffer): Promise<PDFDocument> {
    try {
      return await PDFDocument.load(pdfBuffer, { ignoreEncryption: true });
    } catch (error) {
      throw new ValidationError(
        `Payload is not a readable PDF: ${error instanceof Error ? error.message : "Unknown error"}`,
        { cause: error }
      );
    }
  }

  // Synchronous Document AI requests are capped in pages, so long reports go in slices
  async splitIntoBatches(pdfBuffer: Buffer, maxPagesPerBatch: number = 15): Promise<PDFBatch[]> {
    const pdfDoc = await this.load(pdfBuffer);
    const totalPages = pdfDoc.getPageCount();

    if (totalPages <= maxPagesPerBatch) {
      return [{ buffer: pdfBuffer, startPage: 1, endPage: totalPages, pageCount: totalPages }];
    }

    const batches: PDFBatch[] = [];

    for (let i = 0; i < totalPages; i += maxPagesPerBatch) {
      const startPage = i;
      const endPage = Math.min(i + maxPagesPerBatch, totalPages);
      const pageIndices = Array.from({ length: endPage - startPage }, (_, idx) => startPage + idx);

      const batchDoc = await PDFDocument.create();
      const copiedPages = await batchDoc.copyPages(pdfDoc, pageIndices);
      copiedPages.forEach(page => batchDoc.addPage(page));

      const pdfBytes = await batchDoc.save();
      batches.push({
        buffer: Buffer.from(pdfBytes),
        startPage: startPage + 1,
        endPage: endPage,
        pageCount: endPage - startPage,
      });
    }

    return batches;
  }
}

export function createPDFProcessorService(): PDFProcessorService {
  return new PDFProcessorService();
}
