import { renderRecordXml } from "../xml-mapper.js";
import type { Renderer } from "./renderer.js";

export const xmlRenderer = {
  format: "xml",
  extension: "xml",
  render: (record) => renderRecordXml(record),
} satisfies Renderer;
