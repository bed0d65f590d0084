import { ResultError, ResultOrErrors } from "@outcome/result"
import { issuesToErrors } from "../../lib/validation/issues-to-errors"
import { type AppConfig, type EnvConfig, envSchema } from "./schema"

export function mapEnvToConfig(env: EnvConfig): AppConfig {
  return {
    app: {
      env: env.APP_ENV,
      serviceName: env.SERVICE_NAME,
    },
    server: {
      port: env.PORT,
    },
    logging: {
      level: env.LOG_LEVEL,
      prettify: env.LOG_PRETTY,
    },
    people: {
      nameMinLength: env.PERSON_NAME_MIN_LENGTH,
      nameMaxLength: env.PERSON_NAME_MAX_LENGTH,
      minAge: env.PERSON_MIN_AGE,
    },
  }
}

/**
 * Reads the service configuration from environment variables.
 *
 * Every schema issue becomes a `Config.<KEY>` validation error, so callers see
 * all problems at once instead of the first one.
 */
export function loadAppConfig(env: NodeJS.ProcessEnv): ResultOrErrors<AppConfig> {
  const parsed = envSchema.safeParse(env)

  if (!parsed.success) {
    return ResultOrErrors.failAll(issuesToErrors("Config", parsed.error.issues))
  }

  const config = mapEnvToConfig(parsed.data)

  return ResultOrErrors.ok(config).failIf(
    ({ people }) => people.nameMaxLength < people.nameMinLength,
    ResultError.validation(
      "Config.PERSON_NAME_MAX_LENGTH",
      "PERSON_NAME_MAX_LENGTH must not be below PERSON_NAME_MIN_LENGTH",
      {
        nameMinLength: config.people.nameMinLength,
        nameMaxLength: config.people.nameMaxLength,
      },
    ),
  )
}
