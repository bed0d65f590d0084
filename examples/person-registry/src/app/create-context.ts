import { createPinoLogger, type Logger } from "@outcome/logger"
import type { PeopleServices } from "../domains/people/api"
import type { PersonId } from "../domains/people/model/person.model"
import { PersonDirectory } from "../domains/people/services/person-directory"
import { loadAppConfig } from "./config/load-app-config"
import type { AppConfig } from "./config/schema"
import { ConfigurationError } from "./errors"

export type AppContextOptions = {
  env?: NodeJS.ProcessEnv
  logger?: Logger
  generateId?: () => PersonId
}

export type AppContext = {
  config: AppConfig
  logger: Logger
  services: {
    people: PeopleServices
  }
}

/**
 * @throws {ConfigurationError} when the environment does not describe a valid config
 */
export function createAppContext(options: AppContextOptions = {}): AppContext {
  const loaded = loadAppConfig(options.env ?? process.env)

  if (loaded.isError) {
    throw ConfigurationError.fromErrors(loaded.errors)
  }

  const config = loaded.value

  const logger =
    options.logger ??
    createPinoLogger({}, config.logging, {
      service: config.app.serviceName,
      env: config.app.env,
    })

  const directory = new PersonDirectory({
    rules: config.people,
    generateId: options.generateId,
  })

  return {
    config,
    logger,
    services: {
      people: { directory, logger: logger.child({ module: "people" }) },
    },
  }
}
