/**
 * Error types.
 *
 * ConfigError is raised for anything wrong with the caller's input
 * (arguments, paths, top-k) and is reported before any work starts.
 * ExtractionError marks a single unreadable PDF; the ingest loop counts it
 * as a failed document and moves on.
 */

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

export class ExtractionError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ExtractionError";
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
