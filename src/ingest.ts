/**
 * PDF Ingestion
 *
 * Walks a directory tree, fingerprints every PDF, and writes new or
 * changed documents into the PageStore page-by-page.
 *
 *   discover → read bytes → sha256 → compare with stored digest
 *     unchanged → skipped (extraction never runs)
 *     new       → extract → normalize → insert          → ingested
 *     changed   → extract → normalize → replace pages   → updated
 *
 * Each file is processed independently: a corrupt PDF or a failed write
 * is counted as `failed` and logged, and the run carries on.
 */

import { readdir, readFile, realpath, stat } from "node:fs/promises";
import { basename, extname, join } from "node:path";
import { ConfigError, errorMessage } from "./errors";
import { extractPdfPages } from "./extract";
import { computeSha256 } from "./fingerprint";
import { createConsoleLogger, type Logger } from "./logger";
import { normalizeText } from "./normalize";
import type { PageStore } from "./store";
import type { DocumentOutcome, ExtractPages, IngestStats } from "./types";
import { emptyStats } from "./types";

const PDF_EXTENSION = ".pdf";

export interface IngestOptions {
  extractPages?: ExtractPages;
  logger?: Logger;
  now?: () => Date;
}

// ── Discovery ───────────────────────────────────────────────────────

function isPdfName(name: string): boolean {
  return extname(name).toLowerCase() === PDF_EXTENSION;
}

async function walk(dir: string, found: string[], logger: Logger): Promise<void> {
  const entries = await readdir(dir, { withFileTypes: true });
  for (const entry of entries) {
    const full = join(dir, entry.name);
    if (entry.isDirectory()) {
      await walk(full, found, logger).catch((err: unknown) => {
        logger.warn(`Skipping unreadable directory ${full}: ${errorMessage(err)}`);
      });
    } else if (entry.isFile() && isPdfName(entry.name)) {
      found.push(full);
    } else if (entry.isSymbolicLink() && isPdfName(entry.name)) {
      // Follow links to files only; linked directories are not descended
      const target = await stat(full).catch(() => null);
      if (target?.isFile()) found.push(full);
    }
  }
}

/**
 * Every `*.pdf` (any case) under `dir`, as resolved absolute paths sorted
 * by code unit order. Deterministic regardless of directory listing order.
 * Subdirectories that cannot be listed are logged and left out; failing to
 * list `dir` itself is an error.
 */
export async function discoverPdfs(
  dir: string,
  logger: Logger = createConsoleLogger()
): Promise<string[]> {
  const found: string[] = [];
  await walk(dir, found, logger);

  const resolved = await Promise.all(found.map((f) => realpath(f)));
  return resolved.sort((a, b) => (a < b ? -1 : a > b ? 1 : 0));
}

// ── Single document ─────────────────────────────────────────────────

/**
 * Process one PDF and report what happened. Never throws: any failure is
 * returned as `{ status: "failed" }` with the reason.
 */
export async function ingestDocument(
  store: PageStore,
  filePath: string,
  extractPages: ExtractPages = extractPdfPages,
  now: () => Date = () => new Date()
): Promise<DocumentOutcome> {
  try {
    const resolvedPath = await realpath(filePath);
    const bytes = await readFile(resolvedPath);
    const sha256 = computeSha256(bytes);

    const existing = store.loadExisting(resolvedPath);
    if (existing && existing.sha256 === sha256) {
      return { status: "skipped" };
    }

    const rawPages = await extractPages(bytes, resolvedPath);
    const pages = rawPages.map(normalizeText);

    const status = store.writeDocument({
      path: resolvedPath,
      filename: basename(resolvedPath),
      sha256,
      pages,
      existing,
      now: now(),
    });
    return { status, page_count: pages.length };
  } catch (err) {
    return { status: "failed", reason: errorMessage(err) };
  }
}

// ── Full run ────────────────────────────────────────────────────────

export async function runIngest(
  sourceDir: string,
  store: PageStore,
  options: IngestOptions = {}
): Promise<IngestStats> {
  const sourceStat = await stat(sourceDir).catch(() => null);
  if (!sourceStat) {
    throw new ConfigError(`PDF directory does not exist: ${sourceDir}`);
  }
  if (!sourceStat.isDirectory()) {
    throw new ConfigError(`PDF path is not a directory: ${sourceDir}`);
  }

  const logger = options.logger ?? createConsoleLogger();
  const extractPages = options.extractPages ?? extractPdfPages;
  const now = options.now ?? (() => new Date());

  const pdfs = await discoverPdfs(sourceDir, logger);
  const stats = emptyStats();
  stats.discovered = pdfs.length;
  logger.info(`Found ${pdfs.length} PDF files in ${sourceDir}`);

  store.ensureSchema();

  for (const pdfPath of pdfs) {
    const outcome = await ingestDocument(store, pdfPath, extractPages, now);

    switch (outcome.status) {
      case "ingested":
        stats.ingested++;
        break;
      case "updated":
        stats.updated++;
        break;
      case "skipped":
        stats.skipped++;
        break;
      case "failed":
        stats.failed++;
        logger.error(`Failed to ingest ${pdfPath}: ${outcome.reason}`);
        break;
    }
  }

  logger.info(
    `Complete: ${stats.ingested} ingested, ${stats.updated} updated, ` +
      `${stats.skipped} skipped, ${stats.failed} failed`
  );
  return stats;
}
