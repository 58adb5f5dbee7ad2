import type { Context } from "hono"
import type { EnabledRequestIdConfig } from "../server-options"
import type { Middleware } from "../types/http"

function traceIdFromTraceparent(traceparent: string): string | undefined {
  const traceId = traceparent.split("-")[1]

  if (!traceId || !/^[0-9a-f]{32}$/i.test(traceId) || /^0{32}$/.test(traceId)) {
    return undefined
  }
  return traceId
}

function resolveRequestId(c: Context, config: Required<EnabledRequestIdConfig>): string {
  const fromHeader = c.req.header(config.header)
  if (fromHeader) return fromHeader

  if (config.fallbackToTraceparent) {
    const traceparent = c.req.header("traceparent")
    const traceId = traceparent ? traceIdFromTraceparent(traceparent) : undefined
    if (traceId) return traceId
  }

  return config.generate()
}

/** Takes the request id from the request (or makes one) and echoes it on the response. */
export function requestIdMiddleware(config: Required<EnabledRequestIdConfig>): Middleware {
  return async (c, next) => {
    const requestId = resolveRequestId(c, config)
    c.set("requestId", requestId)

    await next()

    if (!c.res.headers.has(config.header)) {
      c.res.headers.set(config.header, requestId)
    }
  }
}
