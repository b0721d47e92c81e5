#!/usr/bin/env node
/**
 * Power device database CLI
 *
 * Converts vendor XML loss models into Standard Records, restructures them into
 * the V2 schema and renders them to the requested output formats.
 *
 * Usage:
 *   npx tsx cli.ts standardise [--input DUTs] [--output standard_database]
 *   npx tsx cli.ts restructure [--input standard_database] [--output standard_database_v2]
 *   npx tsx cli.ts route --formats xml,html,v2,pdf [--input standard_database] [--output output]
 *   npx tsx cli.ts all
 *
 * Environment variables (or .env file):
 *   DUTS_DIR, STANDARD_DIR, V2_DIR, OUTPUT_DIR, DEVICE_AUTHOR, BATCH_CONCURRENCY
 *   LOG_LEVEL (debug|info|warn|error, default: info)
 */
import "dotenv/config";
import { BatchService, type BatchStats } from "./src/batch-service.js";
import { errorMessage } from "./src/errors.js";
import { isOutputFormat, OUTPUT_FORMATS, type OutputFormat } from "./src/renderers/index.js";
import { CONVERT_CONFIG, PATHS_CONFIG } from "./src/utils/config.js";
import { stageLogger } from "./src/utils/logger.js";

const logger = stageLogger("cli");

const COMMANDS = ["standardise", "restructure", "route", "all"] as const;
type Command = (typeof COMMANDS)[number];

interface CliArgs {
  command: Command;
  input?: string;
  output?: string;
  author: string;
  formats: OutputFormat[];
  concurrency: number;
}

const HELP = `
Power device database: vendor XML → Standard JSON → V2 / XML / HTML / PDF

Usage:
  npx tsx cli.ts <command> [options]

Commands:
  standardise         XML files (recursive) → Standard Records
  restructure         Standard Records → V2 Records
  route               Standard Records → rendered outputs
  all                 standardise, restructure and route in sequence

Options:
  --input, -i <dir>       Input directory (default per command)
  --output, -o <dir>      Output directory (default per command)
  --author <name>         metadata.author for new records (default: ${CONVERT_CONFIG.author})
  --formats, -f <list>    Comma-separated: ${OUTPUT_FORMATS.join(", ")} (default: xml)
  --concurrency <n>       Files converted per batch (default: ${CONVERT_CONFIG.concurrency})
  --help, -h              Show this help

Environment:
  DUTS_DIR            XML input root (default: DUTs)
  STANDARD_DIR        Standard Record directory (default: standard_database)
  V2_DIR              V2 output directory (default: standard_database_v2)
  OUTPUT_DIR          Rendered output directory (default: output)
  DEVICE_AUTHOR       Author recorded in new records (default: unknown)
  BATCH_CONCURRENCY   Files converted per batch (default: 8)
  LOG_LEVEL           debug | info | warn | error (default: info)
`;

function fail(message: string): never {
  console.error(`Error: ${message}`);
  process.exit(1);
}

function isCommand(value: string): value is Command {
  return COMMANDS.some((c) => c === value);
}

// ── Parse CLI args ──────────────────────────────────────────
function parseArgs(argv: string[]): CliArgs {
  const args: CliArgs = {
    command: "all",
    author: CONVERT_CONFIG.author,
    formats: ["xml"],
    concurrency: CONVERT_CONFIG.concurrency,
  };
  let command: string | undefined;

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    const next = argv[i + 1];
    if (arg === "--help" || arg === "-h") {
      console.log(HELP);
      process.exit(0);
    } else if ((arg === "--input" || arg === "-i") && next) {
      args.input = next;
      i++;
    } else if ((arg === "--output" || arg === "-o") && next) {
      args.output = next;
      i++;
    } else if (arg === "--author" && next) {
      args.author = next;
      i++;
    } else if ((arg === "--formats" || arg === "-f") && next) {
      const formats = next.split(",").map((f) => f.trim().toLowerCase()).filter(Boolean);
      const unknown = formats.filter((f) => !isOutputFormat(f));
      if (unknown.length) fail(`Unknown format(s): ${unknown.join(", ")}`);
      args.formats = formats.filter(isOutputFormat);
      i++;
    } else if (arg === "--concurrency" && next) {
      const n = parseInt(next, 10);
      if (!Number.isFinite(n) || n < 1) fail(`Invalid --concurrency: ${next}`);
      args.concurrency = n;
      i++;
    } else if (!arg.startsWith("-") && command === undefined) {
      command = arg;
    } else {
      fail(`Unexpected argument: ${arg}`);
    }
  }

  if (command !== undefined) {
    if (!isCommand(command)) fail(`Unknown command: ${command}. Use --help for usage.`);
    args.command = command;
  }
  if (args.command === "all" && (args.input || args.output)) {
    fail("--input / --output apply to a single command; use the *_DIR variables with 'all'.");
  }
  return args;
}

function logStats(label: string, stats: BatchStats): void {
  logger.info("═══════════════════════════════════════════");
  logger.info(`✅ ${label} complete in ${(stats.durationMs / 1000).toFixed(1)}s`);
  logger.info(`   Files:      ${stats.total}`);
  logger.info(`   Converted:  ${stats.succeeded}`);
  if (stats.failed.length) {
    logger.warn(`   Errors:     ${stats.failed.length}`);
    for (const f of stats.failed) logger.warn(`     - ${f.file}: ${f.message}`);
  }
  logger.info("═══════════════════════════════════════════");
}

// ── Main ────────────────────────────────────────────────────
async function main() {
  const args = parseArgs(process.argv.slice(2));
  const service = new BatchService({ concurrency: args.concurrency });
  const run = args.command;

  if (run === "standardise" || run === "all") {
    const stats = await service.standardiseDirectory({
      inputDir: args.input ?? PATHS_CONFIG.dutsDir,
      outputDir: args.output ?? PATHS_CONFIG.standardDir,
      author: args.author,
    });
    logStats("Standardisation", stats);
  }

  if (run === "restructure" || run === "all") {
    const stats = await service.restructureDirectory({
      inputDir: args.input ?? PATHS_CONFIG.standardDir,
      outputDir: args.output ?? PATHS_CONFIG.v2Dir,
    });
    logStats("Restructuring", stats);
  }

  if (run === "route" || run === "all") {
    const stats = await service.routeDirectory({
      inputDir: args.input ?? PATHS_CONFIG.standardDir,
      outputDir: args.output ?? PATHS_CONFIG.outputDir,
      formats: args.formats,
    });
    logStats("Routing", stats);
  }
}

main().catch((e) => {
  logger.error(`Fatal error: ${errorMessage(e)}`);
  process.exit(1);
});
