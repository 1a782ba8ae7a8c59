import { DEFAULT_START, isPosition, Oscillator } from "@oscillo/oscillator"
import type { Coordinate, TracedCoordinate } from "../ports/coordinate"
import { CodecError } from "./codec-error"
import { sextets } from "./sextets"

/** `endD` of a coordinate that consumed no input. */
export const EMPTY_END_D = 0

/**
 * Runs the oscillator over `bytes` and records the final transition. Only the
 * current state and the last step are kept, whatever the input size.
 */
export function encodeWithTrace(
  bytes: Uint8Array,
  startMask: number = DEFAULT_START,
): TracedCoordinate {
  if (!isPosition(startMask)) throw CodecError.outOfRangeStartPosition(startMask)

  const oscillator = new Oscillator(startMask)
  const bounces = { high: 0, low: 0 }
  let prevMask = startMask
  let endD = EMPTY_END_D
  let steps = 0

  for (const choice of sextets(bytes)) {
    prevMask = oscillator.state.position

    const result = oscillator.step(choice)
    if (result.boundary) bounces[result.boundary]++

    endD = choice
    steps++
  }

  return {
    coordinate: {
      startMask,
      endMask: oscillator.state.position,
      prevMask,
      endD,
      lengthBytes: bytes.length,
    },
    trace: { steps, bounces },
  }
}

export function encode(bytes: Uint8Array, startMask: number = DEFAULT_START): Coordinate {
  return encodeWithTrace(bytes, startMask).coordinate
}
