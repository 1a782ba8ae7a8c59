export { loadCodecConfig, mapEnvToConfig } from "./config/load-codec-config"
export { type CodecConfig, ENV_PREFIX, type EnvConfig, envSchema } from "./config/schema"
export { CodecError, type CodecErrorCode, type CoordinateIssue } from "./core/codec-error"
export {
  coordinateRecordSchema,
  parseCoordinateJson,
  parseCoordinateRecord,
  stringifyCoordinate,
  toCoordinateRecord,
} from "./core/coordinate-record"
export { decode } from "./core/decode"
export { EMPTY_END_D, encode, encodeWithTrace } from "./core/encode"
export {
  OscillatorCodec,
  type OscillatorCodecDeps,
  type OscillatorCodecOptions,
} from "./core/oscillator-codec"
export { startMaskFromSeed } from "./core/seed"
export { BITS_PER_CHOICE, paddingBits, sextets, stepCount, writeSextet } from "./core/sextets"
export { createCodecFromConfig } from "./create-codec"
export type { CodecResult, FailedCodecResult, SuccessfulCodecResult } from "./ports/codec-result"
export type { Coordinate, CoordinateRecord, EncodeTrace, TracedCoordinate } from "./ports/coordinate"
export type { CoordinateCodec } from "./ports/coordinate-codec"
