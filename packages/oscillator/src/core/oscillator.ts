import type { Direction, OscillatorState, StepResult } from "../ports/state"
import { assertPosition, forwardStep } from "./step"

/**
 * Mutable wrapper around {@link forwardStep} holding only the current state.
 */
export class Oscillator {
  private current: OscillatorState

  constructor(position: number, direction: Direction = 1) {
    assertPosition(position)
    this.current = { position, direction }
  }

  get state(): OscillatorState {
    return this.current
  }

  step(choice: number): StepResult {
    const result = forwardStep(this.current, choice)

    this.current = { position: result.position, direction: result.direction }

    return result
  }
}
