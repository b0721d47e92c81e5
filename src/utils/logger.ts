/**
 * Conversion logger
 *
 * Console lines read `09:07:03 INFO  [standardise] Found 3 files (1.2s)`.
 * With LOG_DIR set, every message also goes to `conversion.log` and failures to
 * `conversion-errors.log`, one JSON object per line carrying the stage and,
 * for a failed file, its path.
 */
import { mkdirSync } from "fs";
import path from "path";
import winston from "winston";
import { errorMessage } from "../errors.js";

const LOG_LEVEL = process.env.LOG_LEVEL || "info";
const LOG_DIR = process.env.LOG_DIR;
const LEVEL_WIDTH = 5;
const STAGE_WIDTH = 14;

/** Pipeline step a message belongs to */
export type Stage = "standardise" | "restructure" | "route" | "cli";

export interface LogLine {
  timestamp?: unknown;
  level: string;
  message: unknown;
  stage?: unknown;
  duration?: unknown;
}

export function formatLine(info: LogLine): string {
  const stage = typeof info.stage === "string" ? `[${info.stage}]`.padEnd(STAGE_WIDTH) : "";
  const duration = info.duration !== undefined ? ` (${String(info.duration)})` : "";
  return `${String(info.timestamp ?? "")} ${info.level} ${stage}${String(info.message)}${duration}`;
}

// upper-cased and padded before colorize, which looks colours up by the raw level
const levelColumn = winston.format((info) => {
  info.level = info.level.toUpperCase().padEnd(LEVEL_WIDTH);
  return info;
});

function fileTransports(dir: string): winston.transport[] {
  try {
    mkdirSync(dir, { recursive: true });
  } catch (e) {
    console.warn(`Log files disabled, cannot create "${dir}": ${errorMessage(e)}`);
    return [];
  }
  const format = winston.format.json();
  return [
    new winston.transports.File({
      filename: path.join(dir, "conversion.log"),
      format,
      maxsize: 10 * 1024 * 1024,
      maxFiles: 5,
    }),
    new winston.transports.File({
      filename: path.join(dir, "conversion-errors.log"),
      level: "error",
      format,
      maxsize: 5 * 1024 * 1024,
      maxFiles: 3,
    }),
  ];
}

const logger = winston.createLogger({
  level: LOG_LEVEL,
  // silent under vitest unless LOG_LEVEL is set explicitly
  silent: process.env.VITEST !== undefined && process.env.LOG_LEVEL === undefined,
  format: winston.format.timestamp({ format: "HH:mm:ss" }),
  transports: [
    new winston.transports.Console({
      format: winston.format.combine(levelColumn(), winston.format.colorize(), winston.format.printf(formatLine)),
    }),
    ...(LOG_DIR ? fileTransports(LOG_DIR) : []),
  ],
});

/** Logger whose every line is tagged with the given stage */
export function stageLogger(stage: Stage): winston.Logger {
  return logger.child({ stage });
}
