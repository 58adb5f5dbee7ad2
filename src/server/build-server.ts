import type { AppContext } from "../app/create-context"
import { createReadinessChecks, createStartHooks, createStopHooks } from "../app/lifecycle"
import type { AppError } from "../lib/errors"
import {
  type Application,
  createServer,
  type ErrorMappingsConfig,
  type LifecycleHook,
  type Server,
} from "../lib/server"

export type BuiltServer = {
  app: Application
  server: Server
  startHooks: LifecycleHook[]
  stopHooks: LifecycleHook[]
}

export const errorMappings: ErrorMappingsConfig["mappings"] = {
  validation_error: { status: 400, message: "Request validation failed" },
  invalid_preference: { status: 400, message: "Invalid Prefer header" },
  job_scope_mismatch: { status: 400, message: "Query parameters contradict the request path" },
  job_results_failed: { status: 400, message: "Job failed and has no results" },
  authentication_required: { status: 401, message: "Authentication required" },
  runner_unauthorized: { status: 401, message: "Runner token missing or invalid" },
  job_forbidden: { status: 403, message: "Access to job is not permitted" },
  process_forbidden: { status: 403, message: "Access to process is not permitted" },
  job_not_found: { status: 404, message: "Job not found" },
  process_not_found: { status: 404, message: "Process not found" },
  provider_not_found: { status: 404, message: "Provider not found" },
  job_results_not_ready: { status: 404, message: "Job results are not ready" },
  invalid_job_transition: { status: 409, message: "Invalid job status transition" },
  job_write_conflict: { status: 409, message: "Job was modified concurrently" },
  job_gone: { status: 410, message: "Job was dismissed" },
  invalid_job_filter: { status: 422, message: "Invalid job filter" },
  invalid_job_field: { status: 422, message: "Invalid job field" },
}

function errorDetail(error: AppError): Record<string, unknown> {
  return { detail: error.message, ...error.context }
}

export function buildServer(ctx: AppContext): BuiltServer {
  const startHooks = createStartHooks(ctx)
  const stopHooks = createStopHooks(ctx)

  const server = createServer(
    {
      clock: ctx.services.core.clock,
      logger: ctx.services.core.logger,
    },
    {
      host: ctx.config.server.host,
      port: ctx.config.server.port,
      startupTimeoutMs: ctx.config.server.startupTimeoutMs,
      shutdownTimeoutMs: ctx.config.server.shutdownTimeoutMs,

      errorHandling: {
        kind: "mappings",
        config: { mappings: errorMappings, transformContext: errorDetail },
      },

      requestId: {
        enabled: ctx.config.requestId.enabled,
        header: ctx.config.requestId.header,
        fallbackToTraceparent: ctx.config.requestId.fallbackToTraceparent,
      },

      requestLogging: {
        enabled: ctx.config.requestLogging.enabled,
        level: ctx.config.requestLogging.level,
      },

      health: {
        enabled: true,
        livenessPath: ctx.config.server.livenessPath,
        readinessPath: ctx.config.server.readinessPath,
        readinessChecks: createReadinessChecks(ctx),
        checkTimeoutMs: ctx.config.server.readinessCheckTimeoutMs,
      },

      routes: (app: Application): void => {
        ctx.registerRoutes(app, ctx.config, ctx.services)
      },

      startHooks,
      stopHooks,
    },
  )

  return {
    app: server.app,
    server,
    startHooks,
    stopHooks,
  }
}
