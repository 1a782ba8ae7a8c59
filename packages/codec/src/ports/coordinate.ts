/**
 * Result of one encode pass. Together with the input length it is enough to
 * attempt an exact reconstruction.
 */
export type Coordinate = Readonly<{
  /** Position before the first step. */
  startMask: number
  /** Position after the last step. */
  endMask: number
  /** Position one step before `endMask`. */
  prevMask: number
  /** Choice applied on the last step; 0 for an empty input. */
  endD: number
  lengthBytes: number
}>

/** Wire form of a {@link Coordinate}: exactly these five integer fields. */
export type CoordinateRecord = {
  start_mask: number
  end_mask: number
  prev_mask: number
  end_d: number
  length_bytes: number
}

export type EncodeTrace = Readonly<{
  steps: number
  bounces: Readonly<{ high: number; low: number }>
}>

export type TracedCoordinate = Readonly<{
  coordinate: Coordinate
  trace: EncodeTrace
}>
