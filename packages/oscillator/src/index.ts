export { Oscillator } from "./core/oscillator"
export { OscillatorError, type OscillatorErrorCode } from "./core/oscillator-error"
export { type Interval, ReachableHistory, ReachableSet } from "./core/reachable-set"
export {
  assertChoice,
  assertPosition,
  flip,
  forwardStep,
  inverseStep,
  isChoice,
  isPosition,
} from "./core/step"
export { DEFAULT_START, HIGH, LOW, MAX_CHOICE, MIN_CHOICE, RANGE_WIDTH } from "./ports/bounds"
export type {
  Boundary,
  Direction,
  OscillatorState,
  Predecessor,
  StepHypothesis,
  StepResult,
} from "./ports/state"
