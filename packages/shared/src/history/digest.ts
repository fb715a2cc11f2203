import { createHash } from "node:crypto"

const DIGEST_LENGTH = 16

/**
 * Content digest for checkpoint payloads. Recovery skips a checkpoint whose
 * digest does not match its data.
 */
export function digestOf(data: Record<string, unknown>): string {
  return createHash("sha256").update(JSON.stringify(data)).digest("hex").slice(0, DIGEST_LENGTH)
}
