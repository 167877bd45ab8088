/**
 * Tests for page text normalization and content hashing.
 */

import { describe, test, expect } from "vitest";
import { normalizeText } from "../src/normalize";
import { computeSha256 } from "../src/fingerprint";

describe("normalizeText", () => {
  test("converts every line ending to \\n", () => {
    expect(normalizeText("a\r\nb\r\rc")).toBe("a\nb\nc");
  });

  test("collapses runs of spaces and tabs but keeps newlines", () => {
    expect(normalizeText("x   y\n\n\n\nz")).toBe("x y\n\nz");
    expect(normalizeText("col1\t\t col2\nnext")).toBe("col1 col2\nnext");
  });

  test("keeps a single blank line between paragraphs", () => {
    expect(normalizeText("para one\n\npara two")).toBe("para one\n\npara two");
    expect(normalizeText("para one\r\n\r\n\r\npara two")).toBe("para one\n\npara two");
  });

  test("trims the whole result", () => {
    expect(normalizeText("\n\n  Title  \n")).toBe("Title");
  });

  test("whitespace-only input becomes empty", () => {
    expect(normalizeText(" \t\r\n ")).toBe("");
    expect(normalizeText("")).toBe("");
  });

  test("is idempotent", () => {
    const once = normalizeText("A  b\r\n\r\n\r\n\tc ");
    expect(normalizeText(once)).toBe(once);
  });
});

describe("computeSha256", () => {
  test("produces the standard hex digest", () => {
    expect(computeSha256(new TextEncoder().encode("abc"))).toBe(
      "ba7816bf8f01cfea414140de5dae2223b00361a396177a9cb410ff61f20015ad"
    );
  });

  test("changes when a single byte changes", () => {
    const a = computeSha256(Buffer.from("page one"));
    const b = computeSha256(Buffer.from("page onf"));
    expect(a).toHaveLength(64);
    expect(a).not.toBe(b);
  });
});
