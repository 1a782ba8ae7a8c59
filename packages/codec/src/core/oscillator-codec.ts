import { createNullLogger, type Logger } from "@oscillo/logger"
import { DEFAULT_START, isPosition } from "@oscillo/oscillator"
import type { CodecResult } from "../ports/codec-result"
import type { Coordinate } from "../ports/coordinate"
import type { CoordinateCodec } from "../ports/coordinate-codec"
import { CodecError } from "./codec-error"
import { decode } from "./decode"
import { encodeWithTrace } from "./encode"
import { stepCount } from "./sextets"

export type OscillatorCodecDeps = {
  /** @default NullLogger */
  logger?: Logger
}

export type OscillatorCodecOptions = {
  /**
   * Start position used when `encode` is called without one.
   *
   * @default 50000
   */
  startMask?: number
}

function toResult<T>(run: () => T): CodecResult<T, CodecError> {
  try {
    return { success: true, value: run() }
  } catch (err) {
    if (err instanceof CodecError) return { success: false, error: err }
    throw err
  }
}

export class OscillatorCodec implements CoordinateCodec {
  readonly startMask: number
  private readonly logger: Logger

  constructor(deps: OscillatorCodecDeps = {}, opts: OscillatorCodecOptions = {}) {
    this.startMask = opts.startMask ?? DEFAULT_START
    if (!isPosition(this.startMask)) throw CodecError.outOfRangeStartPosition(this.startMask)

    this.logger = deps.logger ?? createNullLogger()
  }

  encode(bytes: Uint8Array, startMask: number = this.startMask): Coordinate {
    const { coordinate, trace } = encodeWithTrace(bytes, startMask)

    this.logger.debug("encode complete", {
      operation: "encode",
      startMask,
      lengthBytes: coordinate.lengthBytes,
      steps: trace.steps,
      bounces: trace.bounces,
      endMask: coordinate.endMask,
    })

    return coordinate
  }

  decode(coordinate: Coordinate, lengthBytes: number = coordinate.lengthBytes): Uint8Array {
    let bytes: Uint8Array
    try {
      bytes = decode(coordinate, lengthBytes)
    } catch (err) {
      if (err instanceof CodecError) {
        this.logger.warn("decode rejected", {
          operation: "decode",
          startMask: coordinate.startMask,
          lengthBytes,
          code: err.code,
          err,
        })
      }
      throw err
    }

    this.logger.debug("decode complete", {
      operation: "decode",
      startMask: coordinate.startMask,
      lengthBytes,
      steps: stepCount(lengthBytes),
      endMask: coordinate.endMask,
    })

    return bytes
  }

  tryEncode(bytes: Uint8Array, startMask?: number): CodecResult<Coordinate, CodecError> {
    return toResult(() => this.encode(bytes, startMask))
  }

  tryDecode(coordinate: Coordinate, lengthBytes?: number): CodecResult<Uint8Array, CodecError> {
    return toResult(() => this.decode(coordinate, lengthBytes))
  }
}
