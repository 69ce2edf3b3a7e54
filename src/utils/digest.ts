import { createHash } from "crypto";

/**
 * sha256 over the given parts, each followed by a "|" separator.
 * Used for seen digests, cluster ids and synthetic trade keys.
 */
export function digest(...parts: Array<string | number>): string {
  const hash = createHash("sha256");
  for (const part of parts) {
    hash.update(String(part));
    hash.update("|");
  }
  return hash.digest("hex");
}
