/**
 * HTML datasheet: one self-contained page per device.
 */
import * as cheerio from "cheerio";
import type { StandardRecord } from "../types/device.js";
import { buildDatasheet, cellText, type Cell, type DatasheetBlock } from "./datasheet.js";
import type { Renderer } from "./renderer.js";

const STYLE = `
body { font-family: Helvetica, Arial, sans-serif; margin: 2em; color: #1a1a1a; }
h1 { text-align: center; }
h2 { color: #2c3e50; margin-top: 1.5em; }
table { border-collapse: collapse; margin-bottom: 1em; }
th, td { border: 1px solid #000; padding: 4px 10px; text-align: left; }
th { background: #ddd; }
.comment { font-family: monospace; white-space: pre-wrap; }
`;

function keyValueTable($: cheerio.CheerioAPI, rows: [string, Cell][]) {
  const table = $("<table>");
  for (const [label, value] of rows) {
    table.append($("<tr>").append($("<th>").text(label), $("<td>").text(cellText(value, "N/A"))));
  }
  return table;
}

function gridTable($: cheerio.CheerioAPI, headers: string[], rows: Cell[][]) {
  const table = $("<table>");
  table.append($("<tr>").append(...headers.map((h) => $("<th>").text(h))));
  for (const row of rows) {
    table.append($("<tr>").append(...row.map((c) => $("<td>").text(cellText(c, "")))));
  }
  return table;
}

function blockElements($: cheerio.CheerioAPI, block: DatasheetBlock) {
  switch (block.kind) {
    case "pairs":
      return [keyValueTable($, block.rows)];
    case "grid":
      return [gridTable($, block.headers, block.rows)];
    case "lines":
      return block.lines.map((line) => $("<div class=\"comment\">").text(line));
  }
}

export function renderDatasheetHtml(record: StandardRecord, now: Date): string {
  const sheet = buildDatasheet(record, now);

  const $ = cheerio.load("<!DOCTYPE html><html><head><meta charset=\"utf-8\"><title></title><style></style></head><body></body></html>");
  $("title").text(sheet.title);
  $("style").text(STYLE);
  const body = $("body");

  body.append($("<h1>").text(sheet.title));
  for (const section of sheet.sections) {
    if (section.heading) body.append($("<h2>").text(section.heading));
    for (const block of section.blocks) body.append(...blockElements($, block));
  }

  body.append($("<footer>").text(sheet.footer));
  return $.html();
}

export const htmlRenderer = {
  format: "html",
  extension: "html",
  render: (record, ctx) => renderDatasheetHtml(record, ctx.now),
} satisfies Renderer;
