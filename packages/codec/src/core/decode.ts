import {
  type Direction,
  forwardStep,
  HIGH,
  inverseStep,
  isChoice,
  isPosition,
  LOW,
  MAX_CHOICE,
  MIN_CHOICE,
  type OscillatorState,
  ReachableHistory,
  type ReachableSet,
} from "@oscillo/oscillator"
import type { Coordinate } from "../ports/coordinate"
import { CodecError, type CoordinateIssue } from "./codec-error"
import { EMPTY_END_D } from "./encode"
import { hasCleanPadding, stepCount, writeSextet } from "./sextets"

const FIELDS = ["startMask", "endMask", "prevMask", "endD", "lengthBytes"] as const

function assertCoordinate(coordinate: Coordinate): void {
  const issues: CoordinateIssue[] = []

  for (const field of FIELDS) {
    if (!Number.isSafeInteger(coordinate[field])) {
      issues.push({ path: field, message: `${field} must be an integer` })
    }
  }

  for (const field of ["endMask", "prevMask"] as const) {
    if (Number.isSafeInteger(coordinate[field]) && !isPosition(coordinate[field])) {
      issues.push({ path: field, message: `${field} must be within [${LOW}, ${HIGH}]` })
    }
  }

  if (issues.length > 0) throw CodecError.invalidCoordinate(issues)
  if (!isPosition(coordinate.startMask)) {
    throw CodecError.outOfRangeStartPosition(coordinate.startMask)
  }
  if (!isChoice(coordinate.endD)) throw CodecError.invalidChoice(coordinate.endD)
}

function assertLength(coordinate: Coordinate, lengthBytes: number): void {
  if (!Number.isSafeInteger(lengthBytes) || lengthBytes < 0) {
    throw CodecError.lengthMismatch(`Length ${lengthBytes} is not a non-negative integer`, {
      lengthBytes,
    })
  }

  if (coordinate.lengthBytes < 0) {
    throw CodecError.lengthMismatch(`Coordinate length ${coordinate.lengthBytes} is negative`, {
      lengthBytes: coordinate.lengthBytes,
    })
  }

  if (lengthBytes !== coordinate.lengthBytes) {
    throw CodecError.lengthMismatch(
      `Length ${lengthBytes} does not match coordinate length ${coordinate.lengthBytes}`,
      { lengthBytes, expected: coordinate.lengthBytes },
    )
  }
}

/**
 * State before the last step. Both directions are tried from `prevMask`; the
 * survivor must reproduce `endMask` and be reachable from the start.
 */
function resolveAnchor(
  coordinate: Coordinate,
  reachable: ReachableSet,
  steps: number,
): OscillatorState {
  const directions: Direction[] = [1, -1]
  const anchors = directions
    .map((direction) => ({ position: coordinate.prevMask, direction }))
    .filter(
      (state) =>
        forwardStep(state, coordinate.endD).position === coordinate.endMask &&
        reachable.has(state),
    )

  const [anchor] = anchors
  if (!anchor || anchors.length > 1) {
    throw CodecError.ambiguousReconstruction({ step: steps, candidates: anchors.length })
  }

  return anchor
}

/**
 * Rebuilds the input from a coordinate by walking back one step at a time.
 *
 * A step is undone only when exactly one (choice, predecessor) pair is
 * consistent with it and with the start position; anything else is reported,
 * never guessed.
 */
export function decode(coordinate: Coordinate, lengthBytes: number = coordinate.lengthBytes): Uint8Array {
  assertCoordinate(coordinate)
  assertLength(coordinate, lengthBytes)

  if (lengthBytes === 0) {
    const { startMask, endMask, prevMask, endD } = coordinate

    if (endMask !== startMask || prevMask !== startMask || endD !== EMPTY_END_D) {
      throw CodecError.lengthMismatch("Empty coordinate must stay at its start position", {
        lengthBytes,
      })
    }

    return new Uint8Array(0)
  }

  const steps = stepCount(lengthBytes)

  if (!hasCleanPadding(coordinate.endD, lengthBytes)) {
    throw CodecError.ambiguousReconstruction({ step: steps, candidates: 0 })
  }

  const history = new ReachableHistory({ position: coordinate.startMask, direction: 1 })

  let state = resolveAnchor(coordinate, history.at(steps - 1), steps)
  // allocated once the first step is undone; an early rejection allocates nothing
  let out: Uint8Array | undefined

  for (let step = steps - 1; step >= 1; step--) {
    const reachable = history.at(step - 1)
    const survivors: { choice: number; prev: OscillatorState }[] = []

    for (let choice = MIN_CHOICE; choice <= MAX_CHOICE; choice++) {
      for (const prev of inverseStep(state, choice)) {
        if (reachable.has(prev)) survivors.push({ choice, prev })
      }
    }

    const [survivor] = survivors
    if (!survivor || survivors.length > 1) {
      throw CodecError.ambiguousReconstruction({ step, candidates: survivors.length })
    }

    out ??= new Uint8Array(lengthBytes)
    writeSextet(out, step - 1, survivor.choice)
    state = { position: survivor.prev.position, direction: survivor.prev.direction }
  }

  out ??= new Uint8Array(lengthBytes)
  writeSextet(out, steps - 1, coordinate.endD)

  return out
}
