import type { Handler } from "hono"
import { readJsonBody } from "../../../lib/http/read-json-body"
import { reportOutcome } from "../../../lib/report-outcome"
import { renamePersonRequestSchema } from "./people.api.schema"
import type { PeopleServices } from "./people.services"
import { respondWithErrors } from "./respond"

export function renamePersonHandler({ directory, logger }: PeopleServices): Handler {
  return async (c) => {
    const id = c.req.param("id") ?? ""
    const body = await readJsonBody(c, renamePersonRequestSchema)
    const result = reportOutcome(
      logger,
      "people.rename",
      body.andThen(({ name }) => directory.rename(id, name)),
    )

    return result.match<Response>(
      () => c.json({ updated: true }),
      (errors) => respondWithErrors(c, errors),
    )
  }
}
