/**
 * pdf-pages-mcp type definitions
 *
 * Models PDF documents stored page-by-page in SQLite, and the ephemeral
 * search structures rebuilt from those pages on every query.
 */

// ── Stored rows ─────────────────────────────────────────────────────

/** A row of the `documents` table. `path` is the resolved absolute path. */
export interface DocumentRow {
  doc_id: number;
  path: string;
  filename: string;
  sha256: string; // hex digest of the bytes most recently ingested
  page_count: number;
  ingested_at: string; // UTC ISO-8601, second precision
}

/** Projection used by the ingest path to decide skip vs. write */
export interface ExistingDocument {
  doc_id: number;
  sha256: string;
}

/** One page joined with its document, as read by search */
export interface PageRecord {
  filename: string;
  path: string;
  page_index: number; // zero-based
  text: string; // normalized
}

// ── Search ──────────────────────────────────────────────────────────

/** A page plus its token stream. Built per query, never persisted. */
export interface SearchDocument extends PageRecord {
  tokens: string[];
}

export interface SearchHit {
  rank_index: number; // 1-based
  filename: string;
  path: string;
  page_index: number;
  score: number; // BM25
  snippet: string;
}

/**
 * BM25 tuning parameters.
 *
 * Fixed so that rankings are reproducible between runs. k1 controls term
 * frequency saturation, b controls page length normalization.
 */
export interface RankingParams {
  bm25_k1: number;
  bm25_b: number;
}

export const DEFAULT_RANKING: RankingParams = {
  bm25_k1: 1.5,
  bm25_b: 0.75,
};

export const DEFAULT_SNIPPET_CHARS = 240;

/** Upper bound on hits per MCP search request. */
export const MAX_TOP_K = 100;

// ── Ingestion ───────────────────────────────────────────────────────

export interface IngestStats {
  discovered: number;
  ingested: number;
  updated: number;
  skipped: number;
  failed: number;
}

export type WriteStatus = "ingested" | "updated";

/** Result of processing a single discovered file */
export type DocumentOutcome =
  | { status: WriteStatus; page_count: number }
  | { status: "skipped" }
  | { status: "failed"; reason: string };

/**
 * Turns raw PDF bytes into one raw string per page, in page order.
 * Throws when the document cannot be parsed.
 */
export type ExtractPages = (
  bytes: Uint8Array,
  sourcePath: string
) => Promise<string[]>;

export function emptyStats(): IngestStats {
  return { discovered: 0, ingested: 0, updated: 0, skipped: 0, failed: 0 };
}
