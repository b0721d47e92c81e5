/**
 * Batch drivers: run against a temporary directory tree
 */
import { readFileSync } from "fs";
import { mkdir, mkdtemp, readdir, readFile, rm, writeFile } from "fs/promises";
import { tmpdir } from "os";
import path from "path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { BatchService, OutputNamer, safeFileStem } from "../src/batch-service.js";
import { RendererUnavailableError } from "../src/errors.js";
import { RENDERERS, type Renderer } from "../src/renderers/index.js";

const FIXTURE = readFileSync(new URL("./fixtures/C2M0025120D.xml", import.meta.url), "utf-8");
const NOW = new Date(2024, 2, 5, 9, 7, 3);

let root: string;
let duts: string;
let standard: string;

async function writeInput(relative: string, content: string): Promise<void> {
  const file = path.join(duts, relative);
  await mkdir(path.dirname(file), { recursive: true });
  await writeFile(file, content, "utf-8");
}

async function readJson(file: string): Promise<unknown> {
  return JSON.parse(await readFile(file, "utf-8"));
}

beforeEach(async () => {
  root = await mkdtemp(path.join(tmpdir(), "power-device-db-"));
  duts = path.join(root, "DUTs");
  standard = path.join(root, "standard_database");
  await writeInput("SiC/Wolfspeed/mosfets/C2M0025120D.xml", FIXTURE);
  await writeInput("SiC/Wolfspeed/spares/C2M0025120D.xml", FIXTURE);
  await writeInput("broken.xml", FIXTURE.slice(0, 400));
});

afterEach(async () => {
  await rm(root, { recursive: true, force: true });
});

const service = () => new BatchService({ concurrency: 2, clock: () => NOW });

describe("standardiseDirectory", () => {
  it("isolates a corrupt file and converts the rest", async () => {
    const stats = await service().standardiseDirectory({ inputDir: duts, outputDir: standard, author: "test-author" });
    expect(stats.total).toBe(3);
    expect(stats.succeeded).toBe(2);
    expect(stats.failed).toHaveLength(1);
    expect(stats.failed[0].file).toBe(path.join(duts, "broken.xml"));
    expect(stats.failed[0].message).toMatch(/^Malformed XML: /);
  });

  it("suffixes duplicate output names in input order", async () => {
    await service().standardiseDirectory({ inputDir: duts, outputDir: standard, author: "test-author" });
    expect((await readdir(standard)).sort()).toEqual(["C2M0025120D.json", "C2M0025120D_1.json"]);

    const first = await readJson(path.join(standard, "C2M0025120D.json"));
    const second = await readJson(path.join(standard, "C2M0025120D_1.json"));
    expect(first).toMatchObject({
      metadata: { source_path: "SiC/Wolfspeed/mosfets/C2M0025120D.xml", author: "test-author", date: "2024-03-05 09:07:03" },
    });
    expect(second).toMatchObject({ metadata: { source_path: "SiC/Wolfspeed/spares/C2M0025120D.xml" } });
  });

  it("gives the base name to a valid file when a broken one with the same stem sorts first", async () => {
    await writeInput("A/C2M0025120D.xml", FIXTURE.slice(0, 400));
    const stats = await service().standardiseDirectory({ inputDir: duts, outputDir: standard, author: "test-author" });
    expect(stats.failed.map((f) => f.file)).toEqual([path.join(duts, "A/C2M0025120D.xml"), path.join(duts, "broken.xml")]);
    expect((await readdir(standard)).sort()).toEqual(["C2M0025120D.json", "C2M0025120D_1.json"]);
    expect(await readJson(path.join(standard, "C2M0025120D.json"))).toMatchObject({
      metadata: { source_path: "SiC/Wolfspeed/mosfets/C2M0025120D.xml" },
    });
  });

  it("never overwrites an output from an earlier run", async () => {
    await mkdir(standard, { recursive: true });
    await writeFile(path.join(standard, "C2M0025120D.json"), "{}", "utf-8");
    await service().standardiseDirectory({ inputDir: duts, outputDir: standard, author: "test-author" });
    expect(await readFile(path.join(standard, "C2M0025120D.json"), "utf-8")).toBe("{}");
    expect((await readdir(standard)).sort()).toEqual(["C2M0025120D.json", "C2M0025120D_1.json", "C2M0025120D_2.json"]);
  });

  it("fails on a missing input directory", async () => {
    await expect(
      service().standardiseDirectory({ inputDir: path.join(root, "nope"), outputDir: standard, author: "x" }),
    ).rejects.toThrow("Input directory not found");
  });
});

describe("restructureDirectory", () => {
  it("writes one V2 file per valid Standard Record", async () => {
    await service().standardiseDirectory({ inputDir: duts, outputDir: standard, author: "test-author" });
    await writeFile(path.join(standard, "bad.json"), "{", "utf-8");
    const v2Dir = path.join(root, "v2");

    const stats = await service().restructureDirectory({ inputDir: standard, outputDir: v2Dir });
    expect(stats.total).toBe(3);
    expect(stats.succeeded).toBe(2);
    expect(stats.failed.map((f) => path.basename(f.file))).toEqual(["bad.json"]);
    expect((await readdir(v2Dir)).sort()).toEqual(["C2M0025120D.json", "C2M0025120D_1.json"]);
    expect(await readJson(path.join(v2Dir, "C2M0025120D.json"))).toMatchObject({
      device_id: "wolfspeed_c2m0025120d",
      revision: { date: "2024-03-05" },
    });
  });
});

describe("routeDirectory", () => {
  const unavailableHtml: Renderer = {
    format: "html",
    extension: "html",
    isAvailable: async () => {
      throw new RendererUnavailableError("html", "engine not installed");
    },
    render: () => "",
  };

  it("renders each record, named by part number with duplicates suffixed", async () => {
    await service().standardiseDirectory({ inputDir: duts, outputDir: standard, author: "test-author" });
    const out = path.join(root, "output");
    const stats = await service().routeDirectory({ inputDir: standard, outputDir: out, formats: ["xml", "v2"] });
    expect(stats.succeeded).toBe(2);
    expect((await readdir(out)).sort()).toEqual([
      "C2M0025120D.v2.json",
      "C2M0025120D.xml",
      "C2M0025120D_1.v2.json",
      "C2M0025120D_1.xml",
    ]);
  });

  it("writes binary PDF output", async () => {
    await service().standardiseDirectory({ inputDir: duts, outputDir: standard, author: "test-author" });
    const out = path.join(root, "output");
    const stats = await service().routeDirectory({ inputDir: standard, outputDir: out, formats: ["pdf"] });
    expect(stats.failed).toEqual([]);
    expect((await readdir(out)).sort()).toEqual(["C2M0025120D.pdf", "C2M0025120D_1.pdf"]);
    const pdf = await readFile(path.join(out, "C2M0025120D.pdf"));
    expect(pdf.subarray(0, 5).toString("latin1")).toBe("%PDF-");
  });

  it("disables an unavailable format and keeps the others", async () => {
    await service().standardiseDirectory({ inputDir: duts, outputDir: standard, author: "test-author" });
    const out = path.join(root, "output");
    const batch = new BatchService({ concurrency: 2, clock: () => NOW, renderers: { ...RENDERERS, html: unavailableHtml } });

    const stats = await batch.routeDirectory({ inputDir: standard, outputDir: out, formats: ["html", "xml"] });
    expect(stats.failed).toEqual([]);
    expect((await readdir(out)).sort()).toEqual(["C2M0025120D.xml", "C2M0025120D_1.xml"]);
  });

  it("propagates unexpected availability errors", async () => {
    const broken: Renderer = {
      ...unavailableHtml,
      isAvailable: async () => {
        throw new Error("boom");
      },
    };
    const batch = new BatchService({ renderers: { ...RENDERERS, html: broken } });
    await expect(batch.availableRenderers(["html"])).rejects.toThrow("boom");
  });
});

describe("OutputNamer", () => {
  it("skips names taken on disk or earlier in the run", async () => {
    await writeFile(path.join(root, "a.json"), "{}", "utf-8");
    const namer = new OutputNamer(root);
    expect(path.basename(namer.reserve("a", "json"))).toBe("a_1.json");
    expect(path.basename(namer.reserve("a", "json"))).toBe("a_2.json");
    expect(path.basename(namer.reserve("b", "json"))).toBe("b.json");
  });

  it("can ignore files already on disk", async () => {
    await writeFile(path.join(root, "a.xml"), "", "utf-8");
    const namer = new OutputNamer(root, false);
    expect(path.basename(namer.reserve("a", "xml"))).toBe("a.xml");
    expect(path.basename(namer.reserve("a", "xml"))).toBe("a_1.xml");
  });
});

describe("safeFileStem", () => {
  it("replaces dashes and spaces", () => {
    expect(safeFileStem("NTH4L020N120SC1-A B")).toBe("NTH4L020N120SC1_A_B");
  });
});
