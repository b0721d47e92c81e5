/**
 * BatchService: directory-level drivers around the pure transforms
 *
 *   DUTs/**\/*.xml ──standardise──▶ standard_database/*.json
 *   standard_database/*.json ──restructure──▶ standard_database_v2/*.json
 *   standard_database/*.json ──route──▶ output/<part>.{xml,html,v2.json,pdf}
 *
 * Each file is converted on its own: a failure is logged and tallied, and the
 * rest of the batch carries on. Files run in fixed-size concurrent batches.
 */
import { existsSync } from "fs";
import { mkdir, readFile, readdir, writeFile } from "fs/promises";
import path from "path";
import { errorMessage, RendererUnavailableError } from "./errors.js";
import { RENDERERS, type OutputFormat, type Renderer } from "./renderers/index.js";
import { restructureDevice } from "./restructure.js";
import { parseStandardRecord, toStandardJson } from "./schemas.js";
import type { StandardRecord } from "./types/device.js";
import { CONVERT_CONFIG } from "./utils/config.js";
import { stageLogger, type Stage } from "./utils/logger.js";
import { readXmlRecord } from "./xml-mapper.js";

export interface BatchFailure {
  file: string;
  message: string;
}

export interface BatchStats {
  total: number;
  succeeded: number;
  failed: BatchFailure[];
  durationMs: number;
}

export interface BatchServiceOptions {
  /** Files converted concurrently per batch */
  concurrency?: number;
  /** Clock for provenance / revision dates */
  clock?: () => Date;
  /** Format → renderer table used by route */
  renderers?: Readonly<Record<OutputFormat, Renderer>>;
}

export interface StandardiseOptions {
  inputDir: string;
  outputDir: string;
  author: string;
}

export interface DirectoryOptions {
  inputDir: string;
  outputDir: string;
}

export interface RouteOptions extends DirectoryOptions {
  formats: readonly OutputFormat[];
}

// ── Output naming ──

/**
 * Hands out output paths, adding `_1`, `_2`… when a name is already taken in
 * this run (or, with `avoidExisting`, already on disk).
 */
export class OutputNamer {
  private reserved = new Set<string>();

  constructor(private dir: string, private avoidExisting = true) {}

  reserve(stem: string, extension: string): string {
    let candidate = path.join(this.dir, `${stem}.${extension}`);
    let counter = 1;
    while (this.reserved.has(candidate) || (this.avoidExisting && existsSync(candidate))) {
      candidate = path.join(this.dir, `${stem}_${counter}.${extension}`);
      counter++;
    }
    this.reserved.add(candidate);
    return candidate;
  }
}

export function safeFileStem(partNumber: string): string {
  return partNumber.replace(/-/g, "_").replace(/ /g, "_");
}

async function listFiles(dir: string, extension: string, recursive: boolean): Promise<string[]> {
  if (!existsSync(dir)) {
    throw new Error(`Input directory not found: ${dir}`);
  }
  const entries = await readdir(dir, { recursive });
  return entries
    .filter((name) => name.endsWith(extension))
    .sort()
    .map((name) => path.join(dir, name));
}

async function writeJson(file: string, data: unknown): Promise<void> {
  await writeFile(file, `${JSON.stringify(data, null, 2)}\n`, "utf-8");
}

export async function readStandardRecord(file: string): Promise<StandardRecord> {
  const json: unknown = JSON.parse(await readFile(file, "utf-8"));
  return parseStandardRecord(json);
}

export class BatchService {
  private readonly concurrency: number;
  private readonly clock: () => Date;
  private readonly renderers: Readonly<Record<OutputFormat, Renderer>>;

  constructor(options: BatchServiceOptions = {}) {
    this.concurrency = Math.max(1, options.concurrency ?? CONVERT_CONFIG.concurrency);
    this.clock = options.clock ?? (() => new Date());
    this.renderers = options.renderers ?? RENDERERS;
  }

  // ── Batch runner ──

  /**
   * Each batch loads its files concurrently, then saves them. `save` starts in
   * input order once every load of the batch has settled, so output names
   * reserved before its first await do not depend on completion order.
   */
  private async runBatch<T>(
    stage: Stage,
    files: string[],
    load: (file: string) => Promise<T>,
    save: (file: string, loaded: T) => Promise<void>,
  ): Promise<BatchStats> {
    const log = stageLogger(stage);
    const startTime = Date.now();
    const stats: BatchStats = { total: files.length, succeeded: 0, failed: [], durationMs: 0 };

    if (!files.length) {
      log.warn(`No input files found`);
      return stats;
    }
    log.info(`Found ${files.length} files`);

    for (let i = 0; i < files.length; i += this.concurrency) {
      const batch = files.slice(i, i + this.concurrency);
      const loaded = await Promise.allSettled(batch.map(load));
      await Promise.all(batch.map(async (file, j) => {
        try {
          const result = loaded[j];
          if (result.status === "rejected") throw result.reason;
          await save(file, result.value);
          stats.succeeded++;
          if (stats.succeeded % CONVERT_CONFIG.progressEvery === 0) {
            log.info(`Converted ${stats.succeeded}/${files.length} files…`);
          }
        } catch (e) {
          const message = errorMessage(e);
          stats.failed.push({ file, message });
          log.error(`Failed to convert ${file}: ${message}`, { file });
        }
      }));
    }

    stats.durationMs = Date.now() - startTime;
    log.info(`Done: ${stats.succeeded} converted, ${stats.failed.length} errors`, {
      duration: `${(stats.durationMs / 1000).toFixed(1)}s`,
    });
    return stats;
  }

  // ======================================================
  //  XML → STANDARD
  // ======================================================

  async standardiseDirectory(opts: StandardiseOptions): Promise<BatchStats> {
    const files = await listFiles(opts.inputDir, ".xml", true);
    await mkdir(opts.outputDir, { recursive: true });
    const namer = new OutputNamer(opts.outputDir);

    return this.runBatch(
      "standardise",
      files,
      (file) => readXmlRecord(file, { rootDir: opts.inputDir, author: opts.author, now: this.clock() }),
      async (file, record) => {
        // only files that parsed take a name
        const outFile = namer.reserve(path.basename(file, path.extname(file)), "json");
        await writeJson(outFile, toStandardJson(record));
      },
    );
  }

  // ======================================================
  //  STANDARD → V2
  // ======================================================

  async restructureDirectory(opts: DirectoryOptions): Promise<BatchStats> {
    const files = await listFiles(opts.inputDir, ".json", false);
    await mkdir(opts.outputDir, { recursive: true });

    return this.runBatch("restructure", files, readStandardRecord, async (file, record) => {
      const v2 = restructureDevice(record, { now: this.clock() });
      await writeJson(path.join(opts.outputDir, path.basename(file)), v2);
    });
  }

  // ======================================================
  //  STANDARD → OUTPUT FORMATS
  // ======================================================

  /** Formats whose renderer is usable; each unusable one is reported once. */
  async availableRenderers(formats: readonly OutputFormat[]): Promise<Renderer[]> {
    const usable: Renderer[] = [];
    for (const format of new Set(formats)) {
      const renderer = this.renderers[format];
      try {
        await renderer.isAvailable?.();
        usable.push(renderer);
      } catch (e) {
        if (!(e instanceof RendererUnavailableError)) throw e;
        stageLogger("route").warn(e.message);
      }
    }
    return usable;
  }

  async routeDirectory(opts: RouteOptions): Promise<BatchStats> {
    const files = await listFiles(opts.inputDir, ".json", false);
    const renderers = await this.availableRenderers(opts.formats);
    await mkdir(opts.outputDir, { recursive: true });
    const namer = new OutputNamer(opts.outputDir, false);

    return this.runBatch("route", files, readStandardRecord, async (file, record) => {
      const name = safeFileStem(record.metadata.part_number || path.basename(file, ".json"));
      const ctx = { now: this.clock() };
      // all names are reserved before the first write
      const targets = renderers.map((renderer) => ({ renderer, file: namer.reserve(name, renderer.extension) }));
      for (const { renderer, file: outFile } of targets) {
        const output = await renderer.render(record, ctx);
        await writeFile(outFile, output);
      }
    });
  }
}
