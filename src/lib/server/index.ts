export { applyOverrides, type DeepPartial } from "./apply-overrides"
export {
  createErrorFormatter,
  type ErrorMapping,
  type ErrorMappingsConfig,
  type ErrorResponse,
  type ErrorStatus,
} from "./errors/error-formatter"
export { createErrorHandler, type ErrorHandler } from "./errors/error-handler"
export type {
  HookFailure,
  LifecycleHook,
  LifecycleHookContext,
} from "./lifecycle/lifecycle-hook"
export type { StopResult } from "./lifecycle/shutdown"
export type { ServerHandle } from "./lifecycle/stopper"
export { createApp, createRouter, createServer, Server, type ServerState } from "./server"
export {
  type ErrorHandling,
  type ReadinessCheck,
  resolveOptions,
  type ServerDependencies,
  type ServerOptions,
} from "./server-options"
export type { Application, Context, Middleware, RequestHandler, Router } from "./types/http"
