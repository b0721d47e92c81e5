import { htmlRenderer } from "./html-renderer.js";
import { pdfRenderer } from "./pdf-renderer.js";
import type { OutputFormat, Renderer } from "./renderer.js";
import { v2Renderer } from "./v2-renderer.js";
import { xmlRenderer } from "./xml-renderer.js";

export * from "./renderer.js";
export { buildDatasheet, type Datasheet } from "./datasheet.js";
export { htmlRenderer, renderDatasheetHtml } from "./html-renderer.js";
export { pdfRenderer, renderDatasheetPdf } from "./pdf-renderer.js";
export { v2Renderer } from "./v2-renderer.js";
export { xmlRenderer } from "./xml-renderer.js";

export const RENDERERS: Readonly<Record<OutputFormat, Renderer>> = {
  xml: xmlRenderer,
  html: htmlRenderer,
  v2: v2Renderer,
  pdf: pdfRenderer,
};
