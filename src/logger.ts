/**
 * Minimal logging collaborator.
 *
 * Passed explicitly to the ingest loop and the MCP server. Everything goes
 * to stderr so stdout stays reserved for CLI output and the MCP stdio
 * transport.
 */

export interface Logger {
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export function createConsoleLogger(prefix: string = "pdf-pages"): Logger {
  const tag = prefix ? `[${prefix}] ` : "";
  return {
    info: (message) => console.error(`${tag}INFO ${message}`),
    warn: (message) => console.error(`${tag}WARNING ${message}`),
    error: (message) => console.error(`${tag}ERROR ${message}`),
  };
}

/** Discards everything. Handy for tests and library callers. */
export const silentLogger: Logger = {
  info: () => {},
  warn: () => {},
  error: () => {},
};
