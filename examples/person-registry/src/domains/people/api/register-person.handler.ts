import type { Handler } from "hono"
import { readJsonBody } from "../../../lib/http/read-json-body"
import { reportOutcome } from "../../../lib/report-outcome"
import { registerPersonRequestSchema } from "./people.api.schema"
import type { PeopleServices } from "./people.services"
import { respondWithErrors } from "./respond"

export function registerPersonHandler({ directory, logger }: PeopleServices): Handler {
  return async (c) => {
    const body = await readJsonBody(c, registerPersonRequestSchema)
    const result = reportOutcome(
      logger,
      "people.register",
      body.andThen((draft) => directory.register(draft)),
    )

    return result.match<Response>(
      (person) => c.json(person, 201),
      (errors) => respondWithErrors(c, errors),
    )
  }
}
