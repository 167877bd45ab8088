/**
 * Environment configuration for the MCP server.
 *
 *   DB_PATH        SQLite file (default ./data/pages.sqlite)
 *   PDF_DIR        if set, ingested once at startup
 *   TOP_K          default number of search hits (default 10, at most 100)
 *   SNIPPET_CHARS  snippet length (default 240)
 */

import { z } from "zod";
import { ConfigError } from "./errors";
import { DEFAULT_SNIPPET_CHARS, MAX_TOP_K } from "./types";

const envSchema = z.object({
  DB_PATH: z.string().min(1).default("./data/pages.sqlite"),
  PDF_DIR: z.string().min(1).optional(),
  TOP_K: z.coerce.number().int().positive().max(MAX_TOP_K).default(10),
  SNIPPET_CHARS: z.coerce.number().int().positive().default(DEFAULT_SNIPPET_CHARS),
});

export interface ServerConfig {
  db_path: string;
  pdf_dir?: string;
  top_k: number;
  snippet_chars: number;
}

export function loadConfig(
  env: Record<string, string | undefined> = process.env
): ServerConfig {
  // Treat empty strings like unset variables
  const cleaned = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value !== "")
  );

  const parsed = envSchema.safeParse(cleaned);
  if (!parsed.success) {
    const detail = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new ConfigError(`Invalid environment: ${detail}`);
  }

  return {
    db_path: parsed.data.DB_PATH,
    pdf_dir: parsed.data.PDF_DIR,
    top_k: parsed.data.TOP_K,
    snippet_chars: parsed.data.SNIPPET_CHARS,
  };
}
