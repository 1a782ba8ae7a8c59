import { type LogLevelName, logLevelNames } from "@oscillo/logger"
import { DEFAULT_START, HIGH, LOW } from "@oscillo/oscillator"
import { z } from "zod"

export const ENV_PREFIX = "OSCILLO_"

/** Keys as they appear after `ENV_PREFIX` is stripped. */
export const envSchema = z.object({
  START_MASK: z.coerce.number().int().min(LOW).max(HIGH).default(DEFAULT_START),
  START_SEED: z.string().min(1).optional(),

  LOG_LEVEL: z.enum(logLevelNames).default("info"),
  LOG_PRETTY: z.stringbool().default(false),
  SERVICE_NAME: z.string().default("oscillo"),
})

export type EnvConfig = z.infer<typeof envSchema>

export type CodecConfig = {
  codec: {
    startMask: number
    /** Set when `startMask` was derived from a seed. */
    seed?: string
  }

  logging: {
    level: LogLevelName
    prettify: boolean
    serviceName: string
  }
}
