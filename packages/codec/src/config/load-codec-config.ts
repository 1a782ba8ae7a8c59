import { type ConfigSource, DotenvSource, EnvSource, loadConfig, ObjectSource } from "@oscillo/config"
import { startMaskFromSeed } from "../core/seed"
import { type CodecConfig, ENV_PREFIX, type EnvConfig, envSchema } from "./schema"

export function mapEnvToConfig(env: EnvConfig): CodecConfig {
  return {
    codec:
      env.START_SEED !== undefined
        ? { startMask: startMaskFromSeed(env.START_SEED), seed: env.START_SEED }
        : { startMask: env.START_MASK },
    logging: {
      level: env.LOG_LEVEL,
      prettify: env.LOG_PRETTY,
      serviceName: env.SERVICE_NAME,
    },
  }
}

/**
 * Reads `OSCILLO_*` settings from `.env` in `cwd` (optional), then from `env`.
 * `overrides` use unprefixed keys and win over both.
 */
export async function loadCodecConfig(
  env: NodeJS.ProcessEnv,
  overrides?: Partial<Record<keyof EnvConfig, string>>,
  cwd: string = process.cwd(),
): Promise<CodecConfig> {
  const sources: ConfigSource[] = [
    new DotenvSource({ file: ".env", required: false, cwd, prefix: ENV_PREFIX }),
    new EnvSource({ env, prefix: ENV_PREFIX }),
  ]

  if (overrides) sources.push(new ObjectSource(overrides))

  const result = await loadConfig({ schema: envSchema, sources })

  return mapEnvToConfig(result.value)
}
