import type { StandardRecord } from "../types/device.js";

export type OutputFormat = "xml" | "html" | "v2" | "pdf";

export const OUTPUT_FORMATS: readonly OutputFormat[] = ["xml", "html", "v2", "pdf"];

export interface RenderContext {
  now: Date;
}

/** Text formats render to a string, binary ones to bytes */
export type RenderOutput = string | Uint8Array;

export interface Renderer {
  readonly format: OutputFormat;
  /** File extension, without the dot */
  readonly extension: string;
  /** Rejects with RendererUnavailableError when the format cannot be produced in this install. */
  isAvailable?(): Promise<void>;
  render(record: StandardRecord, ctx: RenderContext): RenderOutput | Promise<RenderOutput>;
}

export function isOutputFormat(value: string): value is OutputFormat {
  return OUTPUT_FORMATS.some((f) => f === value);
}
