/**
 * Configuration centralisée: valeurs par défaut surchargées par le .env
 */

function intEnv(key: string, fallback: number): number {
  const val = parseInt(process.env[key] || "", 10);
  return Number.isFinite(val) && val > 0 ? val : fallback;
}

export const PATHS_CONFIG = {
  /** Root of the vendor XML tree; also the base for metadata.source_path */
  dutsDir: process.env.DUTS_DIR || "DUTs",
  standardDir: process.env.STANDARD_DIR || "standard_database",
  v2Dir: process.env.V2_DIR || "standard_database_v2",
  outputDir: process.env.OUTPUT_DIR || "output",
};

export const CONVERT_CONFIG = {
  author: process.env.DEVICE_AUTHOR || "unknown",
  concurrency: intEnv("BATCH_CONCURRENCY", 8),
  progressEvery: 50,
};
