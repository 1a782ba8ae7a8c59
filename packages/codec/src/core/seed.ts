import { createHash } from "node:crypto"
import { HIGH, LOW } from "@oscillo/oscillator"

/**
 * Derives a start position from a text seed: the first 32 bits of its SHA-256,
 * folded into `[LOW, HIGH]`. Equal seeds always give equal positions.
 */
export function startMaskFromSeed(seed: string): number {
  const hash = createHash("sha256").update(seed, "utf8").digest()

  return LOW + (hash.readUInt32BE(0) % (HIGH - LOW + 1))
}
