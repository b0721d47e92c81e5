/**
 * PDF datasheet, same layout as the HTML page.
 *
 * pdfkit is loaded on first use; when it cannot be loaded the format is
 * reported unavailable and the other renderers carry on.
 */
import type PDFDocument from "pdfkit";
import { errorMessage, RendererUnavailableError } from "../errors.js";
import type { StandardRecord } from "../types/device.js";
import { buildDatasheet, cellText, type DatasheetBlock } from "./datasheet.js";
import type { Renderer } from "./renderer.js";

type PdfDocumentClass = typeof PDFDocument;
type PdfDocument = InstanceType<PdfDocumentClass>;

const MARGIN = 50;
const CONTENT_WIDTH = 595.28 - 2 * MARGIN; // A4 width in points

let loading: Promise<PdfDocumentClass> | undefined;

function loadPdfKit(): Promise<PdfDocumentClass> {
  if (!loading) {
    loading = import("pdfkit").then(
      (mod) => mod.default,
      (e: unknown) => {
        loading = undefined;
        throw new RendererUnavailableError("pdf", `pdfkit could not be loaded (${errorMessage(e)})`);
      },
    );
  }
  return loading;
}

function writeBlock(doc: PdfDocument, block: DatasheetBlock): void {
  switch (block.kind) {
    case "pairs":
      for (const [label, value] of block.rows) {
        doc.font("Helvetica-Bold").text(`${label}: `, { continued: true });
        doc.font("Helvetica").text(cellText(value, "N/A"));
      }
      break;
    case "grid": {
      const width = CONTENT_WIDTH / block.headers.length;
      const row = (cells: string[], font: string) => {
        const y = doc.y;
        let bottom = y;
        doc.font(font);
        cells.forEach((cell, i) => {
          doc.text(cell, MARGIN + i * width, y, { width: width - 4 });
          bottom = Math.max(bottom, doc.y);
        });
        doc.x = MARGIN;
        doc.y = bottom;
      };
      row(block.headers, "Helvetica-Bold");
      for (const cells of block.rows) row(cells.map((c) => cellText(c, "")), "Helvetica");
      break;
    }
    case "lines":
      doc.font("Courier").fontSize(9);
      for (const line of block.lines) doc.text(line);
      doc.fontSize(10);
      break;
  }
  doc.moveDown(0.5);
}

export async function renderDatasheetPdf(record: StandardRecord, now: Date): Promise<Buffer> {
  const Pdf = await loadPdfKit();
  const sheet = buildDatasheet(record, now);
  const doc = new Pdf({
    size: "A4",
    margin: MARGIN,
    info: { Title: sheet.title, Author: record.metadata.author, CreationDate: now },
  });

  const chunks: Buffer[] = [];
  const finished = new Promise<Buffer>((resolve, reject) => {
    doc.on("data", (chunk: Buffer) => chunks.push(chunk));
    doc.on("end", () => resolve(Buffer.concat(chunks)));
    doc.on("error", reject);
  });

  doc.font("Helvetica-Bold").fontSize(18).text(sheet.title, { align: "center" });
  doc.moveDown();
  for (const section of sheet.sections) {
    if (section.heading) {
      doc.font("Helvetica-Bold").fontSize(13).fillColor("#2c3e50").text(section.heading);
      doc.fillColor("black").moveDown(0.3);
    }
    doc.fontSize(10);
    for (const block of section.blocks) writeBlock(doc, block);
  }
  doc.moveDown().font("Helvetica-Oblique").fontSize(8).text(sheet.footer);

  doc.end();
  return finished;
}

export const pdfRenderer = {
  format: "pdf",
  extension: "pdf",
  isAvailable: async () => {
    await loadPdfKit();
  },
  render: (record, ctx) => renderDatasheetPdf(record, ctx.now),
} satisfies Renderer;
