import { serve } from "@hono/node-server"
import type { Logger } from "../../logger"
import type { ResolvedServerOptions } from "../server-options"
import type { Application } from "../types/http"
import type { Closeable } from "./shutdown"

export function listen(app: Application, options: ResolvedServerOptions, logger: Logger): Closeable {
  const server = serve({ fetch: app.fetch, port: options.port, hostname: options.host })

  logger.info(`Server listening on http://${options.host}:${options.port}`)

  return server
}

export type ListenFn = typeof listen
