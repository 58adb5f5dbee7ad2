import type { ErrorHandler as HonoErrorHandler } from "hono"
import { routePath } from "hono/route"
import type { Logger } from "../../logger"
import type { ErrorHandling } from "../server-options"
import { createErrorFormatter, type ErrorMappingsConfig, type ErrorStatus } from "./error-formatter"

export type ErrorHandler = HonoErrorHandler

export function createErrorHandler(handling: ErrorHandling, logger: Logger): ErrorHandler {
  return handling.kind === "handler"
    ? handling.errorHandler
    : buildMappedErrorHandler(handling.config, logger)
}

function buildMappedErrorHandler(config: ErrorMappingsConfig, logger: Logger): ErrorHandler {
  const format = createErrorFormatter(config)

  return (err, c) => {
    const requestId = c.get("requestId") ?? "unknown"
    const response = format(err, requestId)
    const route = routePath(c) || c.req.path

    logFailure(c.get("logger") ?? logger, err, {
      requestId,
      method: c.req.method,
      route,
      status: response.error.status,
      code: response.error.code,
    })

    return c.json(response, response.error.status)
  }
}

type FailureMeta = {
  requestId: string
  method: string
  route: string
  status: ErrorStatus
  code: string
}

/** 5xx log at error with the cause; 4xx at info, with the cause at debug. */
function logFailure(logger: Logger, err: unknown, meta: FailureMeta): void {
  const base = { ...meta, op: `${meta.method} ${meta.route}` }

  if (meta.status >= 500) {
    logger.error("Request failed", { ...base, err })
    return
  }

  logger.info("Request failed", base)
  logger.debug("Request failed details", { ...base, err })
}
