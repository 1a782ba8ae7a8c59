import type { CodecError } from "../core/codec-error"
import type { CodecResult } from "./codec-result"
import type { Coordinate } from "./coordinate"

/**
 * Maps bytes to a {@link Coordinate} and back.
 *
 * - encode()/decode() throw a `CodecError` on failure
 * - tryEncode()/tryDecode() return the same failure as a result value
 *
 * Neither form ever returns partial output.
 */
export interface CoordinateCodec {
  encode(bytes: Uint8Array, startMask?: number): Coordinate

  /** `lengthBytes` defaults to the coordinate's own length. */
  decode(coordinate: Coordinate, lengthBytes?: number): Uint8Array

  tryEncode(bytes: Uint8Array, startMask?: number): CodecResult<Coordinate, CodecError>

  tryDecode(coordinate: Coordinate, lengthBytes?: number): CodecResult<Uint8Array, CodecError>
}
