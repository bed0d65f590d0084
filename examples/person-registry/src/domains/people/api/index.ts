import { Hono } from "hono"
import { findPersonHandler, listPeopleHandler } from "./find-person.handler"
import type { PeopleServices } from "./people.services"
import { registerPersonHandler } from "./register-person.handler"
import { removePersonHandler } from "./remove-person.handler"
import { renamePersonHandler } from "./rename-person.handler"

export type { PeopleServices } from "./people.services"

export function createPeopleModule(services: PeopleServices) {
  return {
    name: "people",
    register: (api: Hono) => {
      const people = new Hono()

      people.get("/", listPeopleHandler(services))
      people.post("/", registerPersonHandler(services))
      people.get("/:id", findPersonHandler(services))
      people.patch("/:id", renamePersonHandler(services))
      people.delete("/:id", removePersonHandler(services))

      api.route("/people", people)
    },
  }
}
