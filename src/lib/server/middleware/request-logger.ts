import type { Logger } from "../../logger"
import type { Middleware } from "../types/http"

/** Binds a child logger carrying the request id to the request context. */
export function requestLoggerMiddleware(baseLogger: Logger): Middleware {
  return async (c, next) => {
    const requestId = c.get("requestId")
    c.set("logger", requestId ? baseLogger.child({ requestId }) : baseLogger)

    await next()
  }
}
