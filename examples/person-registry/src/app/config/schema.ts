import { type LogLevelName, logLevelNames } from "@outcome/logger"
import { z } from "zod/mini"

export const envSchema = z.object({
  APP_ENV: z._default(z.string(), "development"),
  SERVICE_NAME: z._default(z.string(), "Person Registry"),

  PORT: z._default(z.coerce.number().check(z.gte(1), z.lte(65_535)), 4680),

  LOG_LEVEL: z._default(z.enum(logLevelNames), "info"),
  LOG_PRETTY: z._default(z.stringbool(), false),

  PERSON_NAME_MIN_LENGTH: z._default(z.coerce.number().check(z.gte(1)), 2),
  PERSON_NAME_MAX_LENGTH: z._default(z.coerce.number().check(z.gte(1)), 50),
  PERSON_MIN_AGE: z._default(z.coerce.number().check(z.gte(0)), 13),
})

export type EnvConfig = z.infer<typeof envSchema>

export type AppConfig = {
  app: {
    env: string
    serviceName: string
  }

  server: {
    port: number
  }

  logging: {
    level: LogLevelName
    prettify: boolean
  }

  people: {
    nameMinLength: number
    nameMaxLength: number
    minAge: number
  }
}
