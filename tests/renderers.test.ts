/**
 * Output renderers
 */
import * as cheerio from "cheerio";
import { readFileSync } from "fs";
import { describe, expect, it } from "vitest";
import { htmlRenderer, isOutputFormat, RENDERERS, v2Renderer, xmlRenderer } from "../src/renderers/index.js";
import { xmlToRecord } from "../src/xml-mapper.js";

const NOW = new Date(2024, 2, 5, 9, 7, 3);
const record = xmlToRecord(readFileSync(new URL("./fixtures/C2M0025120D.xml", import.meta.url), "utf-8"), {
  sourcePath: "DUTs/SiC/Wolfspeed/mosfets/C2M0025120D.xml",
  rootDir: "DUTs",
  author: "test-author",
  now: NOW,
});

describe("renderer registry", () => {
  it("has one renderer per format", () => {
    expect(Object.values(RENDERERS).map((r) => [r.format, r.extension])).toEqual([
      ["xml", "xml"],
      ["html", "html"],
      ["v2", "v2.json"],
      ["pdf", "pdf"],
    ]);
  });

  it("recognises format names", () => {
    expect(isOutputFormat("html")).toBe(true);
    expect(isOutputFormat("pdf")).toBe(true);
    expect(isOutputFormat("mat")).toBe(false);
  });
});

describe("xmlRenderer", () => {
  it("renders the vendor XML document", () => {
    const text = xmlRenderer.render(record);
    expect(text.startsWith('<?xml version="1.0" encoding="UTF-8"?>\n<SemiconductorLibrary ')).toBe(true);
    expect(text.endsWith("</SemiconductorLibrary>\n")).toBe(true);
  });
});

describe("v2Renderer", () => {
  it("renders pretty-printed V2 JSON", () => {
    const text = v2Renderer.render(record, { now: NOW });
    expect(text.startsWith('{\n  "device_id": "wolfspeed_c2m0025120d",')).toBe(true);
    expect(text.endsWith("}\n")).toBe(true);
  });
});

describe("htmlRenderer", () => {
  const $ = cheerio.load(htmlRenderer.render(record, { now: NOW }));
  const valueOf = (label: string) =>
    $("th")
      .filter((_, el) => $(el).text() === label)
      .first()
      .next()
      .text();

  it("titles the page after the part number", () => {
    expect($("title").text()).toBe("C2M0025120D Datasheet");
    expect($("h1").text()).toBe("C2M0025120D Datasheet");
  });

  it("has a section per package part", () => {
    expect($("h2").map((_, el) => $(el).text()).get()).toEqual([
      "Package Information",
      "Variables",
      "Semiconductor Data",
      "Thermal Model",
      "Comment",
    ]);
  });

  it("lists metadata and semiconductor summary", () => {
    expect(valueOf("Manufacturer")).toBe("Wolfspeed");
    expect(valueOf("Material")).toBe("SiC");
    expect(valueOf("Conduction Loss Gates")).toBe("on, off");
    expect(valueOf("Turn-Off Loss Method")).toBe("Table only");
  });

  it("tabulates the thermal chain and comment lines", () => {
    const rcRow = $("tr").filter((_, el) => $(el).children("td").first().text() === "3");
    expect(rcRow.children("td").map((_, el) => $(el).text()).get()).toEqual(["3", "0.015", "0.3"]);
    expect($("div.comment").map((_, el) => $(el).text()).get()).toEqual([
      "Datasheet Rev.3, 2020-05-01",
      "Ron = 0.025 Ohm at Tj = 25 C",
      "Vf = 1.2 V body diode",
    ]);
  });

  it("stamps the generation time", () => {
    expect($("footer").text()).toBe("Generated on 2024-03-05 09:07:03");
  });

  it("falls back to a generic title and skips absent sections", () => {
    const html = htmlRenderer.render(
      { metadata: { ...record.metadata, part_number: "" }, library: record.library, package: { class: "", vendor: "", partnumber: "" } },
      { now: NOW },
    );
    const page = cheerio.load(html);
    expect(page("h1").text()).toBe("Device Datasheet");
    expect(page("h2").map((_, el) => page(el).text()).get()).toEqual(["Package Information"]);
  });
});
