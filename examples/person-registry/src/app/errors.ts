import { BaseError } from "@outcome/errors"
import type { ResultError } from "@outcome/result"

export class ConfigurationError extends BaseError<"invalid_configuration"> {
  static fromErrors(errors: readonly ResultError[]): ConfigurationError {
    const lines = errors.map((e) => `- ${e.code}: ${e.description}`)

    return new ConfigurationError(`Configuration validation failed:\n${lines.join("\n")}`, {
      code: "invalid_configuration",
      context: { issues: errors.map((e) => ({ code: e.code, description: e.description })) },
      isOperational: false,
    })
  }
}
