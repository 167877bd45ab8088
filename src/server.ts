/**
 * MCP Server for PDF page search
 *
 * Exposes the page store to an agent over stdio:
 *
 *   1. search_pages   - BM25 keyword search over all pages
 *   2. get_page       - Read one page in full
 *   3. list_documents - Browse the ingested catalog
 *
 * When PDF_DIR is set, that directory is ingested once before the server
 * starts accepting requests. Unchanged files are skipped by digest, so a
 * restart over the same directory is cheap.
 */

import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";

import { loadConfig } from "./config";
import { runIngest } from "./ingest";
import { createConsoleLogger } from "./logger";
import { PageStore } from "./store";
import { registerTools } from "./tools";

const logger = createConsoleLogger("pdf-pages-mcp");

async function main() {
  const config = loadConfig();

  const store = await PageStore.open(config.db_path);
  store.ensureSchema();

  if (config.pdf_dir) {
    const startTime = Date.now();
    const stats = await runIngest(config.pdf_dir, store, { logger });
    const elapsed = ((Date.now() - startTime) / 1000).toFixed(1);
    logger.info(
      `Ingested ${config.pdf_dir} in ${elapsed}s: ${stats.discovered} discovered, ${stats.failed} failed`
    );
  }

  const stats = store.getStats();
  logger.info(
    `Ready: ${stats.document_count} documents, ${stats.page_count} pages in ${config.db_path}`
  );

  const server = new McpServer({
    name: "pdf-pages-mcp",
    version: "0.1.0",
  });
  registerTools(server, store, {
    top_k: config.top_k,
    snippet_chars: config.snippet_chars,
  });

  const transport = new StdioServerTransport();
  await server.connect(transport);
  logger.info("MCP server running on stdio");
}

main().catch((err: unknown) => {
  logger.error(`Fatal error: ${err instanceof Error ? err.message : String(err)}`);
  process.exit(1);
});
