/**
 * Page Search: BM25 over every stored page
 *
 * There is no persisted index. Each query loads all pages from the store,
 * tokenizes them, and scores them from scratch, so results always reflect
 * the current database contents.
 *
 *   score(q, p) = Σ IDF(qi) · (tf · (k1+1)) / (tf + k1 · (1 - b + b · |p|/avgdl))
 *   IDF(qi)     = ln(1 + (N - n + 0.5) / (n + 0.5))
 *
 * This IDF is strictly positive, so a page scores above zero exactly when
 * it contains at least one query term.
 */

import { stat } from "node:fs/promises";
import { ConfigError } from "./errors";
import { PageStore } from "./store";
import type {
  PageRecord,
  RankingParams,
  SearchDocument,
  SearchHit,
} from "./types";
import { DEFAULT_RANKING, DEFAULT_SNIPPET_CHARS } from "./types";

const TOKEN_SPLIT_RE = /[^0-9a-z]+/;
const WHITESPACE_RE = /\s+/g;

export interface RankOptions {
  ranking?: RankingParams;
  snippetChars?: number;
}

// ── Tokenization ─────────────────────────────────────────────────────

export function tokenize(text: string): string[] {
  return text
    .toLowerCase()
    .split(TOKEN_SPLIT_RE)
    .filter((token) => token.length > 0);
}

// ── Snippets ─────────────────────────────────────────────────────────

/**
 * Single-line excerpt of at most `maxChars` characters. Long text is cut
 * and ends in "..."; a budget of 3 or less leaves room only for dots.
 * Characters are code points, so astral glyphs are never split.
 */
export function makeSnippet(
  text: string,
  maxChars: number = DEFAULT_SNIPPET_CHARS
): string {
  if (maxChars < 1) {
    throw new ConfigError("max_chars must be at least 1");
  }

  const singleLine = text.replace(WHITESPACE_RE, " ").trim();
  const chars = Array.from(singleLine);
  if (chars.length <= maxChars) return singleLine;
  if (maxChars <= 3) return ".".repeat(maxChars);
  return `${chars.slice(0, maxChars - 3).join("").trimEnd()}...`;
}

// ── Ranking ──────────────────────────────────────────────────────────

export function buildCorpus(pages: PageRecord[]): SearchDocument[] {
  return pages.map((page) => ({ ...page, tokens: tokenize(page.text) }));
}

function assertTopK(topK: number): void {
  if (!Number.isInteger(topK) || topK <= 0) {
    throw new ConfigError("--top-k must be greater than 0");
  }
}

function compareStrings(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

/** Per-page BM25 scores, index-aligned with `corpus`. */
export function scoreCorpus(
  corpus: SearchDocument[],
  queryTokens: string[],
  ranking: RankingParams = DEFAULT_RANKING
): number[] {
  const { bm25_k1: k1, bm25_b: b } = ranking;
  const N = corpus.length;
  if (N === 0) return [];

  const termFreqs = corpus.map((doc) => {
    const freqs = new Map<string, number>();
    for (const token of doc.tokens) {
      freqs.set(token, (freqs.get(token) ?? 0) + 1);
    }
    return freqs;
  });

  const totalTokens = corpus.reduce((sum, doc) => sum + doc.tokens.length, 0);
  const avgLength = totalTokens / N;

  // Document frequency per query term
  const idf = new Map<string, number>();
  for (const term of new Set(queryTokens)) {
    const n = termFreqs.filter((freqs) => freqs.has(term)).length;
    idf.set(term, Math.log((N - n + 0.5) / (n + 0.5) + 1));
  }

  return corpus.map((doc, i) => {
    const freqs = termFreqs[i];
    let score = 0;
    for (const term of queryTokens) {
      const tf = freqs.get(term) ?? 0;
      if (tf === 0) continue;
      // tf > 0 implies at least one token in the corpus, so avgLength > 0
      const lengthNorm = 1 - b + b * (doc.tokens.length / avgLength);
      score += (idf.get(term) ?? 0) * ((tf * (k1 + 1)) / (tf + k1 * lengthNorm));
    }
    return score;
  });
}

/**
 * Rank an in-memory corpus against a query.
 *
 * Zero-score pages are dropped. Ties are broken by filename, page index,
 * path, and finally position in `pages`, so the output order is total and
 * reproducible.
 */
export function rankPages(
  pages: PageRecord[],
  query: string,
  topK: number,
  options?: RankOptions
): SearchHit[] {
  assertTopK(topK);
  if (pages.length === 0) return [];

  const queryTokens = tokenize(query);
  if (queryTokens.length === 0) return [];

  const corpus = buildCorpus(pages);
  const scores = scoreCorpus(corpus, queryTokens, options?.ranking);

  const scored: { index: number; score: number }[] = [];
  scores.forEach((score, index) => {
    if (score > 0) scored.push({ index, score });
  });

  scored.sort((x, y) => {
    if (x.score !== y.score) return y.score - x.score;
    const a = corpus[x.index];
    const c = corpus[y.index];
    return (
      compareStrings(a.filename, c.filename) ||
      a.page_index - c.page_index ||
      compareStrings(a.path, c.path) ||
      x.index - y.index
    );
  });

  const snippetChars = options?.snippetChars ?? DEFAULT_SNIPPET_CHARS;
  return scored.slice(0, topK).map(({ index, score }, i) => {
    const doc = corpus[index];
    return {
      rank_index: i + 1,
      filename: doc.filename,
      path: doc.path,
      page_index: doc.page_index,
      score,
      snippet: makeSnippet(doc.text, snippetChars),
    };
  });
}

/** Search an already-open store. */
export function searchStore(
  store: PageStore,
  query: string,
  topK: number,
  options?: RankOptions
): SearchHit[] {
  assertTopK(topK);
  return rankPages(store.loadAllPages(), query, topK, options);
}

/**
 * Search the database file at `dbPath`. The file must already exist; a
 * search never creates an empty database as a side effect.
 */
export async function searchPages(
  dbPath: string,
  query: string,
  topK: number,
  options?: RankOptions
): Promise<SearchHit[]> {
  assertTopK(topK);

  const dbStat = await stat(dbPath).catch(() => null);
  if (!dbStat) {
    throw new ConfigError(`SQLite database does not exist: ${dbPath}`);
  }
  if (!dbStat.isFile()) {
    throw new ConfigError(`SQLite path is not a file: ${dbPath}`);
  }

  const store = await PageStore.open(dbPath);
  try {
    return searchStore(store, query, topK, options);
  } finally {
    store.close();
  }
}

// ── Output ───────────────────────────────────────────────────────────

export function formatHits(hits: SearchHit[]): string[] {
  if (hits.length === 0) return ["No results."];

  const lines: string[] = [];
  for (const hit of hits) {
    lines.push(
      `${hit.rank_index}. ${hit.filename}:p${hit.page_index + 1} score=${hit.score.toFixed(4)}`
    );
    lines.push(`  ${hit.snippet}`);
  }
  return lines;
}
