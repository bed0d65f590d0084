import type { Handler } from "hono"
import { reportOutcome } from "../../../lib/report-outcome"
import type { PeopleServices } from "./people.services"
import { respondWithErrors } from "./respond"

export function removePersonHandler({ directory, logger }: PeopleServices): Handler {
  return (c) => {
    const id = c.req.param("id") ?? ""
    const result = reportOutcome(logger, "people.remove", directory.remove(id))

    return result.match<Response>(
      () => c.body(null, 204),
      (errors) => respondWithErrors(c, errors),
    )
  }
}
