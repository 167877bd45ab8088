// ── Content hashing ─────────────────────────────────────────────────
//
// A file whose digest matches the stored one is skipped without running
// extraction. This is change detection only, not an integrity check.

import { createHash } from "node:crypto";

export function computeSha256(bytes: Uint8Array): string {
  return createHash("sha256").update(bytes).digest("hex");
}
