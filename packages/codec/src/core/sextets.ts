/**
 * Bytes are read MSB first and cut into 6-bit groups, one group per step. The
 * last group is right-padded with zero bits, so `n` bytes become
 * `ceil(8n / 6)` choices and the padding is 0, 2 or 4 bits.
 */

export const BITS_PER_CHOICE = 6

export function stepCount(lengthBytes: number): number {
  return Math.ceil((lengthBytes * 8) / BITS_PER_CHOICE)
}

export function paddingBits(lengthBytes: number): number {
  return stepCount(lengthBytes) * BITS_PER_CHOICE - lengthBytes * 8
}

/** True when the padding bits a final choice has to carry are all zero. */
export function hasCleanPadding(lastChoice: number, lengthBytes: number): boolean {
  const mask = (1 << paddingBits(lengthBytes)) - 1

  return (lastChoice & mask) === 0
}

export function* sextets(bytes: Uint8Array): Generator<number, void, undefined> {
  let buffer = 0
  let bits = 0

  for (const byte of bytes) {
    buffer = (buffer << 8) | byte
    bits += 8

    while (bits >= BITS_PER_CHOICE) {
      bits -= BITS_PER_CHOICE
      yield (buffer >> bits) & 0x3f
    }

    buffer &= (1 << bits) - 1
  }

  if (bits > 0) yield (buffer << (BITS_PER_CHOICE - bits)) & 0x3f
}

/**
 * Writes choice number `index` into its place in `out`, the inverse of
 * {@link sextets} one group at a time. Bits past the last byte are padding and
 * are dropped.
 */
export function writeSextet(out: Uint8Array, index: number, choice: number): void {
  const totalBits = out.length * 8

  for (let bit = 0; bit < BITS_PER_CHOICE; bit++) {
    const at = index * BITS_PER_CHOICE + bit
    if (at >= totalBits) return

    if ((choice >> (BITS_PER_CHOICE - 1 - bit)) & 1) {
      const byte = Math.floor(at / 8)
      out[byte] = (out[byte] ?? 0) | (0x80 >> (at % 8))
    }
  }
}
