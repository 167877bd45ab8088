/**
 * Page Store: SQLite persistence for documents and their pages
 *
 * One row per PDF in `documents`, one row per page in `pages`. A document's
 * pages are always replaced as a whole inside a single transaction, so the
 * page indices of a document are exactly 0..page_count-1 at every point a
 * reader can observe.
 *
 * The database runs in sql.js (SQLite compiled to WebAssembly). It lives in
 * memory and is written back to `dbPath` after every committed change, via
 * a temp file and a rename so the file on disk is always a whole database.
 *
 * Rows are decoded through zod schemas right after each query; nothing
 * outside this module sees an untyped row.
 */

import { existsSync, mkdirSync, readFileSync, renameSync, writeFileSync } from "node:fs";
import { dirname } from "node:path";
import initSqlJs, {
  type Database as SqlJsDatabase,
  type ParamsObject,
  type SqlJsStatic,
  type SqlValue,
} from "sql.js";
import { z } from "zod";
import type {
  DocumentRow,
  ExistingDocument,
  PageRecord,
  WriteStatus,
} from "./types";

export const MEMORY_DB = ":memory:";

const SCHEMA_SQL = `
  CREATE TABLE IF NOT EXISTS documents (
    doc_id INTEGER PRIMARY KEY,
    path TEXT NOT NULL UNIQUE,
    filename TEXT NOT NULL,
    sha256 TEXT NOT NULL,
    page_count INTEGER NOT NULL,
    ingested_at TEXT NOT NULL
  );

  CREATE TABLE IF NOT EXISTS pages (
    doc_id INTEGER NOT NULL REFERENCES documents(doc_id) ON DELETE CASCADE,
    page_index INTEGER NOT NULL,
    text TEXT NOT NULL,
    PRIMARY KEY (doc_id, page_index)
  );

  CREATE INDEX IF NOT EXISTS idx_documents_sha256 ON documents(sha256);
`;

// ── Row decoders ────────────────────────────────────────────────────

const existingRowSchema = z.object({
  doc_id: z.number().int(),
  sha256: z.string(),
});

const documentRowSchema = z.object({
  doc_id: z.number().int(),
  path: z.string(),
  filename: z.string(),
  sha256: z.string(),
  page_count: z.number().int(),
  ingested_at: z.string(),
});

const pageRowSchema = z.object({
  filename: z.string(),
  path: z.string(),
  page_index: z.number().int(),
  text: z.string(),
});

const countRowSchema = z.object({ n: z.number().int() });
const rowIdSchema = z.object({ id: z.number().int() });

let sqlJs: Promise<SqlJsStatic> | undefined;

/** The WebAssembly module is loaded once per process. */
function loadSqlJs(): Promise<SqlJsStatic> {
  sqlJs ??= initSqlJs();
  return sqlJs;
}

export interface WriteDocumentInput {
  path: string;
  filename: string;
  sha256: string;
  pages: string[];
  existing: ExistingDocument | null;
  now?: Date;
}

export interface StoreStats {
  document_count: number;
  page_count: number;
}

/** UTC timestamp truncated to seconds, e.g. 2025-01-01T00:00:00Z */
export function utcTimestamp(date: Date = new Date()): string {
  return date.toISOString().replace(/\.\d{3}Z$/, "Z");
}

export class PageStore {
  private constructor(
    private readonly db: SqlJsDatabase,
    private readonly dbPath: string
  ) {
    this.enableForeignKeys();
  }

  /**
   * Open the database at `dbPath`, or start an empty one if the file does
   * not exist yet. Nothing is written until the first schema or document
   * write; parent directories are created then. Pass ":memory:" for a
   * throwaway in-process store that is never written anywhere.
   */
  static async open(dbPath: string): Promise<PageStore> {
    const SQL = await loadSqlJs();
    const db =
      dbPath !== MEMORY_DB && existsSync(dbPath)
        ? new SQL.Database(readFileSync(dbPath))
        : new SQL.Database();
    return new PageStore(db, dbPath);
  }

  /** Safe to call on every startup. */
  ensureSchema(): void {
    this.db.exec(SCHEMA_SQL);
    this.persist();
  }

  close(): void {
    this.db.close();
  }

  // ── Ingest path ─────────────────────────────────────────────────

  loadExisting(path: string): ExistingDocument | null {
    const row = this.get("SELECT doc_id, sha256 FROM documents WHERE path = ?", [path]);
    return row === undefined ? null : existingRowSchema.parse(row);
  }

  /**
   * Insert a new document, or replace an existing one's metadata and
   * every one of its pages. All-or-nothing: if any statement throws, the
   * transaction is rolled back and the error propagates. The file on disk
   * is rewritten only after a successful commit.
   */
  writeDocument(input: WriteDocumentInput): WriteStatus {
    const { path, filename, sha256, pages, existing } = input;
    const ingestedAt = utcTimestamp(input.now);

    const status = this.transaction((): WriteStatus => {
      let docId: number;
      let result: WriteStatus;

      if (existing === null) {
        this.db.run(
          `INSERT INTO documents(path, filename, sha256, page_count, ingested_at)
           VALUES (?, ?, ?, ?, ?)`,
          [path, filename, sha256, pages.length, ingestedAt]
        );
        docId = rowIdSchema.parse(this.get("SELECT last_insert_rowid() AS id")).id;
        result = "ingested";
      } else {
        docId = existing.doc_id;
        this.db.run(
          `UPDATE documents
           SET filename = ?, sha256 = ?, page_count = ?, ingested_at = ?
           WHERE doc_id = ?`,
          [filename, sha256, pages.length, ingestedAt, docId]
        );
        this.db.run("DELETE FROM pages WHERE doc_id = ?", [docId]);
        result = "updated";
      }

      const insertPage = this.db.prepare(
        "INSERT INTO pages(doc_id, page_index, text) VALUES (?, ?, ?)"
      );
      try {
        pages.forEach((text, pageIndex) => {
          insertPage.run([docId, pageIndex, text]);
        });
      } finally {
        insertPage.free();
      }

      return result;
    });

    this.persist();
    return status;
  }

  // ── Search path ─────────────────────────────────────────────────

  /**
   * Every stored page, ordered by filename, page index, then path. The
   * ordering is part of the ranking tie-break, so it must not depend on
   * physical row order.
   */
  loadAllPages(): PageRecord[] {
    const rows = this.all(
      `SELECT d.filename, d.path, p.page_index, p.text
       FROM pages p
       JOIN documents d ON d.doc_id = p.doc_id
       ORDER BY d.filename ASC, p.page_index ASC, d.path ASC`
    );
    return rows.map((row) => pageRowSchema.parse(row));
  }

  // ── Catalog (MCP tools) ─────────────────────────────────────────

  getDocument(path: string): DocumentRow | null {
    const row = this.get(
      `SELECT doc_id, path, filename, sha256, page_count, ingested_at
       FROM documents WHERE path = ?`,
      [path]
    );
    return row === undefined ? null : documentRowSchema.parse(row);
  }

  listDocuments(options?: { limit?: number; offset?: number }): {
    total: number;
    documents: DocumentRow[];
  } {
    const limit = options?.limit ?? 50;
    const offset = options?.offset ?? 0;

    const rows = this.all(
      `SELECT doc_id, path, filename, sha256, page_count, ingested_at
       FROM documents
       ORDER BY filename ASC, path ASC
       LIMIT ? OFFSET ?`,
      [limit, offset]
    );

    return {
      total: this.count("SELECT COUNT(*) AS n FROM documents"),
      documents: rows.map((row) => documentRowSchema.parse(row)),
    };
  }

  getPage(path: string, pageIndex: number): PageRecord | null {
    const row = this.get(
      `SELECT d.filename, d.path, p.page_index, p.text
       FROM pages p
       JOIN documents d ON d.doc_id = p.doc_id
       WHERE d.path = ? AND p.page_index = ?`,
      [path, pageIndex]
    );
    return row === undefined ? null : pageRowSchema.parse(row);
  }

  getStats(): StoreStats {
    return {
      document_count: this.count("SELECT COUNT(*) AS n FROM documents"),
      page_count: this.count("SELECT COUNT(*) AS n FROM pages"),
    };
  }

  /**
   * Direct handle on the underlying database, for tests that need to
   * reach below the store API (triggers, catalog queries).
   *
   * @internal
   */
  get raw(): SqlJsDatabase {
    return this.db;
  }

  private all(sql: string, params: SqlValue[] = []): ParamsObject[] {
    const stmt = this.db.prepare(sql);
    try {
      stmt.bind(params);
      const rows: ParamsObject[] = [];
      while (stmt.step()) rows.push(stmt.getAsObject());
      return rows;
    } finally {
      stmt.free();
    }
  }

  private get(sql: string, params: SqlValue[] = []): ParamsObject | undefined {
    const [row] = this.all(sql, params);
    return row;
  }

  private count(sql: string): number {
    return countRowSchema.parse(this.get(sql)).n;
  }

  private transaction<T>(fn: () => T): T {
    this.db.run("BEGIN");
    try {
      const result = fn();
      this.db.run("COMMIT");
      return result;
    } catch (err) {
      this.db.run("ROLLBACK");
      throw err;
    }
  }

  private enableForeignKeys(): void {
    this.db.run("PRAGMA foreign_keys = ON");
  }

  /**
   * Write the whole database back to disk. `export()` reopens the
   * connection inside sql.js, which resets per-connection pragmas.
   */
  private persist(): void {
    if (this.dbPath === MEMORY_DB) return;

    mkdirSync(dirname(this.dbPath), { recursive: true });
    const tmpPath = `${this.dbPath}.tmp`;
    writeFileSync(tmpPath, this.db.export());
    renameSync(tmpPath, this.dbPath);
    this.enableForeignKeys();
  }
}
