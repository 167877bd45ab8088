// ── Page text normalization ─────────────────────────────────────────
//
// Applied to every extracted page before it is stored, so that the same
// PDF always produces byte-identical page rows.

const SPACE_TAB_RE = /[ \t]+/g;
const THREE_PLUS_NEWLINES_RE = /\n{3,}/g;

export function normalizeText(raw: string): string {
  return raw
    .replace(/\r\n/g, "\n")
    .replace(/\r/g, "\n")
    .replace(SPACE_TAB_RE, " ")
    .replace(THREE_PLUS_NEWLINES_RE, "\n\n")
    .trim();
}
