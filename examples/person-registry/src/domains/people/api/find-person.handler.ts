import type { Handler } from "hono"
import { reportOutcome } from "../../../lib/report-outcome"
import type { PeopleServices } from "./people.services"
import { respondWithErrors } from "./respond"

export function findPersonHandler({ directory, logger }: PeopleServices): Handler {
  return (c) => {
    const id = c.req.param("id") ?? ""
    const result = reportOutcome(logger, "people.find", directory.find(id))

    return result.match<Response>(
      (person) => c.json(person),
      (errors) => respondWithErrors(c, errors),
    )
  }
}

export function listPeopleHandler({ directory }: PeopleServices): Handler {
  return (c) => c.json({ people: directory.list() })
}
