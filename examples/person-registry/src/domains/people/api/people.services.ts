import type { Logger } from "@outcome/logger"
import type { PersonDirectory } from "../services/person-directory"

export type PeopleServices = {
  directory: PersonDirectory
  logger: Logger
}
