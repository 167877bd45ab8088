/**
 * Shared MCP tool & resource registration
 *
 * Kept apart from server.ts so integration tests can wire a McpServer to
 * a Client over InMemoryTransport without any real I/O.
 */

import { z } from "zod";
import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { formatHits, searchStore } from "./search";
import type { PageStore } from "./store";
import { DEFAULT_SNIPPET_CHARS, MAX_TOP_K } from "./types";

export interface ToolDefaults {
  top_k: number;
  snippet_chars: number;
}

const FALLBACK_DEFAULTS: ToolDefaults = {
  top_k: 10,
  snippet_chars: DEFAULT_SNIPPET_CHARS,
};

/**
 * Register all tools and resources on the given MCP server.
 *
 * Tools:
 *   1. search_pages   - BM25 search across every stored page
 *   2. get_page       - Full text of one page
 *   3. list_documents - Catalog of ingested PDFs
 *
 * Resources:
 *   - index-stats (pdf-pages://stats) - JSON document/page counts
 */
export function registerTools(
  server: McpServer,
  store: PageStore,
  defaults: ToolDefaults = FALLBACK_DEFAULTS
): void {
  // ── Tool 1: search_pages ───────────────────────────────────────────

  server.tool(
    "search_pages",
    "Keyword search across every ingested PDF page. Returns ranked pages with a short snippet. Use get_page with the returned path and page number to read the full text.",
    {
      query: z
        .string()
        .describe("Space-separated search terms"),
      top_k: z
        .number()
        .int()
        .min(1)
        .max(MAX_TOP_K)
        .optional()
        .describe(`Max results (default ${defaults.top_k})`),
    },
    async ({ query, top_k }) => {
      const hits = searchStore(store, query, top_k ?? defaults.top_k, {
        snippetChars: defaults.snippet_chars,
      });

      if (hits.length === 0) {
        return {
          content: [
            {
              type: "text" as const,
              text: `No results found for "${query}". Try other terms or use list_documents to browse the catalog.`,
            },
          ],
        };
      }

      const formatted = hits
        .map((h) => `${formatHits([h]).join("\n")}\n   path: ${h.path}`)
        .join("\n\n");

      return {
        content: [
          {
            type: "text" as const,
            text: `Search results for "${query}" (${hits.length} pages):\n\n${formatted}`,
          },
        ],
      };
    }
  );

  // ── Tool 2: get_page ───────────────────────────────────────────────

  server.tool(
    "get_page",
    "Retrieve the full normalized text of one page of an ingested PDF.",
    {
      path: z.string().describe("Absolute document path (from search_pages or list_documents)"),
      page: z.number().int().min(1).describe("1-based page number"),
    },
    async ({ path, page }) => {
      const doc = store.getDocument(path);
      if (!doc) {
        return {
          content: [
            {
              type: "text" as const,
              text: `Document "${path}" not found. Use list_documents to see available documents.`,
            },
          ],
        };
      }

      const record = store.getPage(path, page - 1);
      if (!record) {
        return {
          content: [
            {
              type: "text" as const,
              text: `Page ${page} does not exist in ${doc.filename} (${doc.page_count} pages).`,
            },
          ],
        };
      }

      return {
        content: [
          {
            type: "text" as const,
            text: `━━━ ${record.filename} - page ${page} of ${doc.page_count} ━━━\n\n${record.text || "(empty page)"}`,
          },
        ],
      };
    }
  );

  // ── Tool 3: list_documents ─────────────────────────────────────────

  server.tool(
    "list_documents",
    "List ingested PDF documents with their page counts and ingestion time.",
    {
      limit: z
        .number()
        .int()
        .min(1)
        .max(200)
        .default(50)
        .describe("Max results to return"),
      offset: z
        .number()
        .int()
        .min(0)
        .default(0)
        .describe("Pagination offset"),
    },
    async ({ limit, offset }) => {
      const result = store.listDocuments({ limit, offset });

      if (result.documents.length === 0) {
        return {
          content: [
            {
              type: "text" as const,
              text: `No documents (total ${result.total}).`,
            },
          ],
        };
      }

      const summary = result.documents
        .map(
          (d) =>
            `• ${d.filename} (${d.page_count} pages, ingested ${d.ingested_at})\n  path: ${d.path}`
        )
        .join("\n\n");

      return {
        content: [
          {
            type: "text" as const,
            text: `Found ${result.total} documents (showing ${offset + 1}-${offset + result.documents.length}):\n\n${summary}`,
          },
        ],
      };
    }
  );

  // ── Resources: expose store stats ──────────────────────────────────

  server.resource("index-stats", "pdf-pages://stats", async (uri) => {
    const stats = store.getStats();
    return {
      contents: [
        {
          uri: uri.href,
          mimeType: "application/json",
          text: JSON.stringify(stats, null, 2),
        },
      ],
    };
  });
}
