import { createPinoLogger, type PinoLoggerDeps } from "@oscillo/logger"
import type { CodecConfig } from "./config/schema"
import { OscillatorCodec } from "./core/oscillator-codec"

export function createCodecFromConfig(
  config: CodecConfig,
  deps: PinoLoggerDeps = {},
): OscillatorCodec {
  const logger = createPinoLogger(
    deps,
    { level: config.logging.level, prettify: config.logging.prettify },
    { service: config.logging.serviceName, module: "codec" },
  )

  return new OscillatorCodec({ logger }, { startMask: config.codec.startMask })
}
