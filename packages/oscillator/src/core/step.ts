import { HIGH, LOW, MAX_CHOICE, MIN_CHOICE } from "../ports/bounds"
import type {
  Direction,
  OscillatorState,
  Predecessor,
  StepHypothesis,
  StepResult,
} from "../ports/state"
import { OscillatorError } from "./oscillator-error"

export function isPosition(value: number): boolean {
  return Number.isSafeInteger(value) && value >= LOW && value <= HIGH
}

export function isChoice(value: number): boolean {
  return Number.isSafeInteger(value) && value >= MIN_CHOICE && value <= MAX_CHOICE
}

export function assertPosition(position: number): void {
  if (!isPosition(position)) throw OscillatorError.positionOutOfRange(position)
}

export function assertChoice(choice: number): void {
  if (!isChoice(choice)) throw OscillatorError.invalidChoice(choice)
}

export function flip(direction: Direction): Direction {
  return direction === 1 ? -1 : 1
}

/**
 * Advances `state` by `choice`. A candidate past a boundary is mirrored back off
 * that boundary and the direction flips.
 */
export function forwardStep(state: OscillatorState, choice: number): StepResult {
  assertPosition(state.position)
  assertChoice(choice)

  const candidate = state.position + state.direction * choice

  if (candidate > HIGH) {
    return {
      position: HIGH - (candidate - HIGH),
      direction: flip(state.direction),
      bounced: true,
      boundary: "high",
    }
  }

  if (candidate < LOW) {
    return {
      position: LOW + (LOW - candidate),
      direction: flip(state.direction),
      bounced: true,
      boundary: "low",
    }
  }

  return { position: candidate, direction: state.direction, bounced: false }
}

function predecessorCandidate(
  state: OscillatorState,
  choice: number,
  hypothesis: StepHypothesis,
): OscillatorState | undefined {
  switch (hypothesis) {
    case "no_bounce":
      return { position: state.position - state.direction * choice, direction: state.direction }
    case "bounce_high":
      // Only a climb can overshoot HIGH, and it leaves the state heading down.
      if (state.direction !== -1) return undefined
      return { position: 2 * HIGH - choice - state.position, direction: 1 }
    case "bounce_low":
      if (state.direction !== 1) return undefined
      return { position: 2 * LOW + choice - state.position, direction: -1 }
  }
}

const HYPOTHESES: readonly StepHypothesis[] = ["no_bounce", "bounce_high", "bounce_low"]

/**
 * Every state that `forwardStep(…, choice)` takes to `state`.
 *
 * Each hypothesis is confirmed by re-applying the forward step, so an entry is
 * returned only when it reproduces `state` exactly. The list is empty when no
 * predecessor exists and may hold two entries (a plain move and a bounce) that the
 * caller has to tell apart by other means.
 */
export function inverseStep(state: OscillatorState, choice: number): Predecessor[] {
  assertPosition(state.position)
  assertChoice(choice)

  const found: Predecessor[] = []

  for (const hypothesis of HYPOTHESES) {
    const prev = predecessorCandidate(state, choice, hypothesis)
    if (!prev || !isPosition(prev.position)) continue

    const replay = forwardStep(prev, choice)

    if (replay.position === state.position && replay.direction === state.direction) {
      found.push({ ...prev, hypothesis })
    }
  }

  return found
}
