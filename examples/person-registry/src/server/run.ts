import { serve } from "@hono/node-server"
import { createApp } from "../app/create-app"
import { createAppContext } from "../app/create-context"

const context = createAppContext()
const app = createApp(context)

serve({ fetch: app.fetch, port: context.config.server.port }, (info) => {
  context.logger.info(`Listening on port ${info.port}`)
})
