import { BaseError } from "@oscillo/errors"
import { HIGH, LOW, MAX_CHOICE, MIN_CHOICE } from "../ports/bounds"

export type OscillatorErrorCode = "position_out_of_range" | "invalid_choice"

export class OscillatorError extends BaseError<OscillatorErrorCode> {
  static positionOutOfRange(position: number): OscillatorError {
    return new OscillatorError(`Position ${position} is outside [${LOW}, ${HIGH}]`, {
      code: "position_out_of_range",
      context: { position, low: LOW, high: HIGH },
    })
  }

  /** A choice outside the legal range means the caller's mapping is broken. */
  static invalidChoice(choice: number): OscillatorError {
    return new OscillatorError(
      `Choice ${choice} is outside [${MIN_CHOICE}, ${MAX_CHOICE}]`,
      {
        code: "invalid_choice",
        context: { choice },
        isOperational: false,
      },
    )
  }
}
