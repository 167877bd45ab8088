/**
 * Tests for environment configuration.
 */

import { describe, test, expect } from "vitest";
import { loadConfig } from "../src/config";
import { ConfigError } from "../src/errors";

describe("loadConfig", () => {
  test("applies defaults", () => {
    expect(loadConfig({})).toEqual({
      db_path: "./data/pages.sqlite",
      pdf_dir: undefined,
      top_k: 10,
      snippet_chars: 240,
    });
  });

  test("reads and coerces variables", () => {
    expect(
      loadConfig({ DB_PATH: "/tmp/x.sqlite", PDF_DIR: "/pdfs", TOP_K: "25", SNIPPET_CHARS: "80" })
    ).toEqual({
      db_path: "/tmp/x.sqlite",
      pdf_dir: "/pdfs",
      top_k: 25,
      snippet_chars: 80,
    });
  });

  test("empty strings count as unset", () => {
    expect(loadConfig({ PDF_DIR: "", TOP_K: "" })).toMatchObject({ pdf_dir: undefined, top_k: 10 });
  });

  test("rejects a non-positive TOP_K", () => {
    expect(() => loadConfig({ TOP_K: "0" })).toThrow(ConfigError);
    expect(() => loadConfig({ TOP_K: "many" })).toThrow(/^Invalid environment: TOP_K: /);
  });

  test("caps TOP_K at the per-request search limit", () => {
    expect(loadConfig({ TOP_K: "100" }).top_k).toBe(100);
    expect(() => loadConfig({ TOP_K: "150" })).toThrow(/^Invalid environment: TOP_K: /);
  });
});
