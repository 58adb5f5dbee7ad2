import { routePath } from "hono/route"
import type { Clock } from "../../clock"
import type { Logger } from "../../logger"
import type { EnabledRequestLoggingConfig, PathString } from "../server-options"
import type { Middleware } from "../types/http"

/** Logs one line per completed request: 5xx at error, the rest at the configured level. */
export function requestLoggingMiddleware(
  config: Required<EnabledRequestLoggingConfig>,
  deps: { logger: Logger; clock: Clock },
): Middleware {
  return async (c, next) => {
    const path = c.req.path

    if (isIgnored(path, config.ignorePaths)) {
      await next()
      return
    }

    const startedAt = deps.clock.nowMs()

    try {
      await next()
    } finally {
      const status = c.res.status
      const method = c.req.method
      const route = routePath(c) || path
      const userAgent = c.req.header("user-agent")

      const meta = {
        requestId: c.get("requestId") ?? "unknown",
        method,
        path,
        route,
        op: `${method} ${route}`,
        status,
        durationMs: Math.round(deps.clock.nowMs() - startedAt),
        ...(userAgent !== undefined && { userAgent }),
      }

      const logger = c.get("logger") ?? deps.logger

      if (status >= 500) logger.error("Request completed", meta)
      else logger[config.level]("Request completed", meta)
    }
  }
}

function isIgnored(path: string, ignorePaths: PathString[]): boolean {
  return ignorePaths.some((ignored) => path === ignored || path.startsWith(`${ignored}/`))
}
