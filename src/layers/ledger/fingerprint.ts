import { createHash } from "node:crypto";

import { normalizeForComparison } from "../../utils/text.js";

/**
 * Dedup key for a question: normalized text plus the sorted set of normalized
 * options. Reordering options or changing case does not produce a new key.
 */
export function computeFingerprint(questionText: string, options: readonly string[]): string {
  const normalizedOptions = [...new Set(options.map(normalizeForComparison))].sort();
  const payload = [normalizeForComparison(questionText), ...normalizedOptions].join("␟");
  return createHash("sha256").update(payload).digest("hex");
}
