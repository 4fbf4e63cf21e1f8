import { PDFDocument } from "pdf-lib";
import type { Marker } from "@shared/schema";
import type { DocumentLike, DocumentProcessor, TableLike } from "../services/document-ai";

export class FakeProcessor implements DocumentProcessor {
  readonly processorId = "test-processor";
  readonly calls: Buffer[] = [];
  private respond: (pdfBuffer: Buffer, call: number) => DocumentLike | Promise<DocumentLike>;

  constructor(respond: (pdfBuffer: Buffer, call: number) => DocumentLike | Promise<DocumentLike>) {
    this.respond = respond;
  }

  async process(pdfBuffer: Buffer): Promise<DocumentLike> {
    this.calls.push(pdfBuffer);
    return this.respond(pdfBuffer, this.calls.length);
  }
}

export async function createPdf(pageCount: number): Promise<Buffer> {
  const pdf = await PDFDocument.create();
  for (let i = 0; i < pageCount; i++) {
    pdf.addPage();
  }
  return Buffer.from(await pdf.save());
}

export async function pageCountOf(pdfBuffer: Buffer): Promise<number> {
  const pdf = await PDFDocument.load(pdfBuffer);
  return pdf.getPageCount();
}

export function tableFromRows(rows: string[][]): TableLike {
  return {
    bodyRows: rows.map((cells) => ({ cells: cells.map((text) => ({ layout: { text } })) })),
  };
}

export function marker(overrides: Partial<Marker> & Pick<Marker, "test">): Marker {
  return {
    result: "1",
    unit: "",
    reference_range: "",
    category: "clinical_chemistry",
    confidence: 0,
    is_critical: false,
    ...overrides,
  };
}
