export type Direction = 1 | -1

export type OscillatorState = Readonly<{
  position: number
  direction: Direction
}>

export type Boundary = "high" | "low"

export type StepResult = OscillatorState &
  Readonly<{
    bounced: boolean
    /** The boundary reflected off; set only when `bounced` is true. */
    boundary?: Boundary
  }>

/**
 * How a predecessor relates to the state it stepped into:
 * - `no_bounce`: same direction, plain move
 * - `bounce_high`: moved up past HIGH, reflected, now heading down
 * - `bounce_low`: moved down past LOW, reflected, now heading up
 */
export type StepHypothesis = "no_bounce" | "bounce_high" | "bounce_low"

export type Predecessor = OscillatorState &
  Readonly<{
    hypothesis: StepHypothesis
  }>
