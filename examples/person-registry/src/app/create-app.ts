import { Hono } from "hono"
import { createPeopleModule } from "../domains/people/api"
import { createErrorHandler } from "../lib/http/error-handler"
import type { AppContext } from "./create-context"

export function createApp(ctx: AppContext): Hono {
  const app = new Hono()

  app.onError(createErrorHandler(ctx.logger))

  createPeopleModule(ctx.services.people).register(app)

  return app
}
