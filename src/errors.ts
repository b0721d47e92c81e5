/**
 * Error types shared by the codec, the mapper and the batch drivers.
 */

/** Structural failure while reading a vendor XML document (aborts that one file). */
export class XmlParseError extends Error {
  constructor(message: string, public readonly detail?: string) {
    super(detail ? `${message}: ${detail}` : message);
    this.name = "XmlParseError";
  }
}

/** An output format whose backing library cannot be loaded. Disables only that format. */
export class RendererUnavailableError extends Error {
  constructor(public readonly format: string, reason: string) {
    super(`${format} output disabled: ${reason}`);
    this.name = "RendererUnavailableError";
  }
}

export function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}
