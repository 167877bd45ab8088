#!/usr/bin/env tsx
/**
 * Command-line entry point.
 *
 * Usage:
 *   tsx src/cli.ts ingest <source_dir> <db_path>
 *   tsx src/cli.ts search <db_path> <query> [--top-k N]
 *
 * `ingest` exits 1 when any document failed. `search` exits 1 only on bad
 * arguments or a missing database; an empty result is still a success.
 */

import { realpathSync } from "node:fs";
import { stat } from "node:fs/promises";
import { fileURLToPath } from "node:url";
import { ConfigError, errorMessage } from "./errors";
import { runIngest } from "./ingest";
import { createConsoleLogger, type Logger } from "./logger";
import { formatHits, searchPages } from "./search";
import { PageStore } from "./store";
import type { ExtractPages, IngestStats } from "./types";

const DEFAULT_TOP_K = 10;

const USAGE = [
  "Usage:",
  "  pdf-pages ingest <source_dir> <db_path>",
  "  pdf-pages search <db_path> <query> [--top-k N]",
].join("\n");

export interface CliIO {
  print: (line: string) => void;
  logger: Logger;
  extractPages?: ExtractPages;
}

function defaultIO(): CliIO {
  return {
    print: (line) => console.log(line),
    logger: createConsoleLogger(""),
  };
}

// ── Argument helpers ────────────────────────────────────────────────

/** Pull `--name value` out of args, returning the value and the rest. */
function takeOption(
  args: string[],
  name: string
): { value: string | undefined; rest: string[] } {
  const idx = args.indexOf(`--${name}`);
  if (idx === -1) return { value: undefined, rest: args };
  if (idx + 1 >= args.length) {
    throw new ConfigError(`--${name} requires a value`);
  }
  return {
    value: args[idx + 1],
    rest: [...args.slice(0, idx), ...args.slice(idx + 2)],
  };
}

function parseTopK(raw: string | undefined): number {
  if (raw === undefined) return DEFAULT_TOP_K;
  if (!/^[+-]?\d+$/.test(raw)) {
    throw new ConfigError(`--top-k must be an integer, got '${raw}'`);
  }
  return parseInt(raw, 10);
}

function expectArgs(command: string, args: string[], names: string[]): string[] {
  if (args.length !== names.length) {
    throw new ConfigError(
      `${command} expects ${names.map((n) => `<${n}>`).join(" ")}\n${USAGE}`
    );
  }
  return args;
}

// ── Commands ────────────────────────────────────────────────────────

export function summaryLines(stats: IngestStats): string[] {
  return [
    `Discovered PDFs: ${stats.discovered}`,
    `Ingested new: ${stats.ingested}`,
    `Updated changed: ${stats.updated}`,
    `Skipped unchanged: ${stats.skipped}`,
    `Failed: ${stats.failed}`,
  ];
}

async function handleIngest(args: string[], io: CliIO): Promise<number> {
  const [sourceDir, dbPath] = expectArgs("ingest", args, ["source_dir", "db_path"]);

  // Validated again by runIngest; checked here so a bad directory never
  // creates an empty database file.
  const store = await openForIngest(sourceDir, dbPath, io);
  try {
    const stats = await runIngest(sourceDir, store, {
      logger: io.logger,
      extractPages: io.extractPages,
    });
    for (const line of summaryLines(stats)) io.print(line);
    return stats.failed > 0 ? 1 : 0;
  } finally {
    store.close();
  }
}

async function openForIngest(
  sourceDir: string,
  dbPath: string,
  io: CliIO
): Promise<PageStore> {
  const sourceStat = await stat(sourceDir).catch(() => null);
  if (!sourceStat) {
    throw new ConfigError(`PDF directory does not exist: ${sourceDir}`);
  }
  if (!sourceStat.isDirectory()) {
    throw new ConfigError(`PDF path is not a directory: ${sourceDir}`);
  }
  io.logger.info(`Ingesting ${sourceDir} into ${dbPath}`);
  return PageStore.open(dbPath);
}

async function handleSearch(args: string[], io: CliIO): Promise<number> {
  const { value, rest } = takeOption(args, "top-k");
  const topK = parseTopK(value);
  const [dbPath, query] = expectArgs("search", rest, ["db_path", "query"]);

  const hits = await searchPages(dbPath, query, topK);
  for (const line of formatHits(hits)) io.print(line);
  return 0;
}

// ── Main ────────────────────────────────────────────────────────────

export async function main(argv: string[], io: CliIO = defaultIO()): Promise<number> {
  const [command, ...args] = argv;

  try {
    switch (command) {
      case "ingest":
        return await handleIngest(args, io);
      case "search":
        return await handleSearch(args, io);
      case undefined:
        io.logger.error(`No command given\n${USAGE}`);
        return 1;
      default:
        io.logger.error(`Unknown command: ${command}\n${USAGE}`);
        return 1;
    }
  } catch (err) {
    if (err instanceof ConfigError) {
      io.logger.error(err.message);
    } else {
      io.logger.error(`Unexpected error: ${errorMessage(err)}`);
    }
    return 1;
  }
}

function isEntryPoint(): boolean {
  const entry = process.argv[1];
  if (!entry) return false;
  try {
    return realpathSync(entry) === realpathSync(fileURLToPath(import.meta.url));
  } catch {
    return false;
  }
}

if (isEntryPoint()) {
  main(process.argv.slice(2)).then(
    (code) => {
      process.exitCode = code;
    },
    (err: unknown) => {
      console.error("Fatal error:", err);
      process.exitCode = 1;
    }
  );
}
