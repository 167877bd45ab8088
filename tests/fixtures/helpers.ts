/**
 * Shared test helpers.
 *
 * Provides an in-memory PageStore, a fake PDF extractor that reads pages
 * out of plain-text "PDF" files, temp-directory helpers, and a ready-to-use
 * MCP test client wired through InMemoryTransport.
 */

import { mkdtemp, mkdir, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { dirname, join } from "node:path";
import { Client } from "@modelcontextprotocol/sdk/client/index.js";
import { InMemoryTransport } from "@modelcontextprotocol/sdk/inMemory.js";
import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { ExtractionError } from "../../src/errors";
import type { Logger } from "../../src/logger";
import { MEMORY_DB, PageStore } from "../../src/store";
import { registerTools, type ToolDefaults } from "../../src/tools";
import type { ExtractPages, PageRecord } from "../../src/types";

// ── Store ────────────────────────────────────────────────────────────

export async function makeStore(): Promise<PageStore> {
  const store = await PageStore.open(MEMORY_DB);
  store.ensureSchema();
  return store;
}

/** Insert whole documents directly, bypassing ingestion. */
export function seedStore(
  store: PageStore,
  docs: { path: string; filename?: string; pages: string[]; sha256?: string }[]
): void {
  for (const doc of docs) {
    store.writeDocument({
      path: doc.path,
      filename: doc.filename ?? doc.path.split("/").pop() ?? doc.path,
      sha256: doc.sha256 ?? "0".repeat(64),
      pages: doc.pages,
      existing: store.loadExisting(doc.path),
      now: FIXED_NOW,
    });
  }
}

export function page(
  filename: string,
  page_index: number,
  text: string,
  path: string = `/corpus/${filename}`
): PageRecord {
  return { filename, path, page_index, text };
}

export const FIXED_NOW = new Date("2025-01-01T00:00:00.000Z");

// ── Fake extractor ───────────────────────────────────────────────────

export const PAGE_BREAK = "\f";
export const CORRUPT_MARKER = "CORRUPT";

/**
 * Treats file bytes as UTF-8 text with pages separated by form feeds.
 * Files starting with CORRUPT fail the way an unreadable PDF would.
 * Every call is recorded in `calls`.
 */
export function fakeExtractor(): ExtractPages & { calls: string[] } {
  const calls: string[] = [];
  const extract = async (bytes: Uint8Array, sourcePath: string) => {
    calls.push(sourcePath);
    const text = Buffer.from(bytes).toString("utf8");
    if (text.startsWith(CORRUPT_MARKER)) {
      throw new ExtractionError(`Unable to read PDF '${sourcePath}': bad xref table`);
    }
    return text.split(PAGE_BREAK);
  };
  return Object.assign(extract, { calls });
}

// ── Logger ───────────────────────────────────────────────────────────

export function recordingLogger(): Logger & { lines: string[] } {
  const lines: string[] = [];
  return {
    lines,
    info: (message) => lines.push(`INFO ${message}`),
    warn: (message) => lines.push(`WARNING ${message}`),
    error: (message) => lines.push(`ERROR ${message}`),
  };
}

// ── Temp directories ─────────────────────────────────────────────────

export async function makeTempDir(prefix: string = "pdf-pages-test-"): Promise<string> {
  return mkdtemp(join(tmpdir(), prefix));
}

export async function removeDir(dir: string): Promise<void> {
  await rm(dir, { recursive: true, force: true });
}

/** Write a fake PDF whose pages are the given strings. */
export async function writeFakePdf(
  root: string,
  relPath: string,
  pages: string[]
): Promise<string> {
  const full = join(root, relPath);
  await mkdir(dirname(full), { recursive: true });
  await writeFile(full, pages.join(PAGE_BREAK));
  return full;
}

export async function writeCorruptPdf(root: string, relPath: string): Promise<string> {
  const full = join(root, relPath);
  await mkdir(dirname(full), { recursive: true });
  await writeFile(full, `${CORRUPT_MARKER} not really a pdf`);
  return full;
}

// ── MCP test client factory ──────────────────────────────────────────

export interface McpTestHarness {
  client: Client;
  store: PageStore;
  mcpServer: McpServer;
  cleanup: () => Promise<void>;
}

export async function createMcpTestClient(
  seeded?: PageStore,
  defaults?: ToolDefaults
): Promise<McpTestHarness> {
  const store = seeded ?? (await makeStore());
  const mcpServer = new McpServer({
    name: "pdf-pages-test",
    version: "0.0.1",
  });
  registerTools(mcpServer, store, defaults);

  const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();

  // Connect server first, then client
  await mcpServer.server.connect(serverTransport);

  const client = new Client({ name: "test-client", version: "0.0.1" });
  await client.connect(clientTransport);

  return {
    client,
    store,
    mcpServer,
    cleanup: async () => {
      await client.close();
      await mcpServer.server.close();
      store.close();
    },
  };
}

interface ToolContent {
  type: string;
  text?: unknown;
}

/** Extract the text parts of a callTool result. */
export function getToolText(result: { content?: unknown; [key: string]: unknown }): string {
  const content = Array.isArray(result.content) ? result.content : [];
  return content
    .filter((c): c is ToolContent => typeof c === "object" && c !== null && "type" in c)
    .filter((c) => c.type === "text" && typeof c.text === "string")
    .map((c) => String(c.text))
    .join("\n");
}
