import { BaseError } from "@oscillo/errors"

export class ConfigError extends BaseError<"config_invalid"> {
  static invalid(details: string, sources: string[]): ConfigError {
    return new ConfigError(`Configuration validation failed:\n${details}`, {
      code: "config_invalid",
      context: { sources },
      isOperational: true,
    })
  }
}
