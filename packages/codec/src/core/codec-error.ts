import { BaseError } from "@oscillo/errors"
import { HIGH, LOW, MAX_CHOICE, MIN_CHOICE } from "@oscillo/oscillator"

export type CodecErrorCode =
  | "out_of_range_start_position"
  | "invalid_choice"
  | "ambiguous_reconstruction"
  | "length_mismatch"
  | "invalid_coordinate"

export type CoordinateIssue = { path: string; message: string }

export class CodecError extends BaseError<CodecErrorCode> {
  static outOfRangeStartPosition(startMask: number): CodecError {
    return new CodecError(`Start position ${startMask} is outside [${LOW}, ${HIGH}]`, {
      code: "out_of_range_start_position",
      context: { startMask, low: LOW, high: HIGH },
    })
  }

  static invalidChoice(choice: number): CodecError {
    return new CodecError(`Choice ${choice} is outside [${MIN_CHOICE}, ${MAX_CHOICE}]`, {
      code: "invalid_choice",
      context: { choice },
      isOperational: false,
    })
  }

  /**
   * `candidates` is 0 when nothing reproduces the coordinate and more than 1
   * when several inputs do.
   */
  static ambiguousReconstruction(input: { step: number; candidates: number }): CodecError {
    const reason =
      input.candidates === 0 ? "no consistent predecessor" : `${input.candidates} consistent predecessors`

    return new CodecError(`Cannot reconstruct step ${input.step}: ${reason}`, {
      code: "ambiguous_reconstruction",
      context: { step: input.step, candidates: input.candidates },
    })
  }

  static lengthMismatch(message: string, context: { lengthBytes: number; expected?: number }): CodecError {
    return new CodecError(message, {
      code: "length_mismatch",
      context: {
        lengthBytes: context.lengthBytes,
        ...(context.expected !== undefined && { expected: context.expected }),
      },
    })
  }

  static invalidCoordinate(issues: CoordinateIssue[], cause?: unknown): CodecError {
    return new CodecError(issues[0]?.message ?? "Invalid coordinate", {
      code: "invalid_coordinate",
      context: { issues },
      cause,
    })
  }
}
