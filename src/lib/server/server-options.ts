import { randomUUID } from "node:crypto"
import type { Clock, Milliseconds } from "../clock"
import type { Logger, LogLevelName } from "../logger"
import type { ErrorHandler } from "./errors/error-handler"
import type { ErrorMappingsConfig } from "./errors/error-formatter"
import type { LifecycleHook } from "./lifecycle/lifecycle-hook"
import type { Application } from "./types/http"

export type PathString = `/${string}`

export interface DisabledConfig {
  enabled: false
}

export interface ServerDependencies {
  logger: Logger
  clock: Clock
}

export interface EnabledRequestIdConfig {
  enabled: true

  /** @default "x-request-id" */
  header?: string

  /**
   * Use the trace id of a W3C `traceparent` header when the request id
   * header is absent.
   * @default false
   */
  fallbackToTraceparent?: boolean

  /** @default crypto.randomUUID */
  generate?: () => string
}

export interface EnabledRequestLoggingConfig {
  enabled: true

  /**
   * Level for completed requests. 5xx responses always log at `error`.
   * @default "info"
   */
  level?: LogLevelName

  /** @default the health paths when health routes are enabled */
  ignorePaths?: PathString[]
}

export interface ReadinessCheck {
  name: string
  timeoutMs?: Milliseconds
  fn: (signal: AbortSignal) => Promise<boolean>
}

export interface EnabledHealthConfig {
  enabled: true
  livenessPath?: PathString
  readinessPath?: PathString
  readinessChecks?: ReadinessCheck[]
  checkTimeoutMs?: Milliseconds
}

export type ErrorHandling =
  | { kind: "handler"; errorHandler: ErrorHandler }
  | { kind: "mappings"; config: ErrorMappingsConfig }

export type RequestIdConfig = DisabledConfig | EnabledRequestIdConfig
export type RequestLoggingConfig = DisabledConfig | EnabledRequestLoggingConfig
export type HealthConfig = DisabledConfig | EnabledHealthConfig

export interface ServerOptions {
  port: number

  /** @default "0.0.0.0" */
  host?: string

  /** @default no limit */
  startupTimeoutMs?: Milliseconds

  /** @default 10_000 */
  shutdownTimeoutMs?: Milliseconds

  requestId?: RequestIdConfig
  requestLogging?: RequestLoggingConfig
  health?: HealthConfig
  errorHandling: ErrorHandling

  routes: (app: Application) => void

  startHooks?: LifecycleHook[]
  stopHooks?: LifecycleHook[]
}

export type ResolvedRequestIdConfig = DisabledConfig | Required<EnabledRequestIdConfig>
export type ResolvedRequestLoggingConfig = DisabledConfig | Required<EnabledRequestLoggingConfig>
export type ResolvedHealthConfig = DisabledConfig | Required<EnabledHealthConfig>

export type ResolvedServerOptions = {
  port: number
  host: string
  startupTimeoutMs: Milliseconds
  shutdownTimeoutMs: Milliseconds
  requestId: ResolvedRequestIdConfig
  requestLogging: ResolvedRequestLoggingConfig
  health: ResolvedHealthConfig
  errorHandling: ErrorHandling
  routes: (app: Application) => void
  startHooks: LifecycleHook[]
  stopHooks: LifecycleHook[]
}

const MAX_TIMER_MS: Milliseconds = 2_147_483_647

interface ServerDefaults {
  host: string
  startupTimeoutMs: Milliseconds
  shutdownTimeoutMs: Milliseconds
  requestId: Required<EnabledRequestIdConfig>
  requestLoggingLevel: LogLevelName
  health: Required<EnabledHealthConfig>
}

export const DEFAULTS: ServerDefaults = {
  host: "0.0.0.0",
  startupTimeoutMs: MAX_TIMER_MS,
  shutdownTimeoutMs: 10_000,
  requestId: {
    enabled: true,
    header: "x-request-id",
    fallbackToTraceparent: false,
    generate: () => randomUUID(),
  },
  requestLoggingLevel: "info",
  health: {
    enabled: true,
    livenessPath: "/health",
    readinessPath: "/ready",
    readinessChecks: [],
    checkTimeoutMs: 5_000,
  },
}

export function resolveOptions(options: ServerOptions): ResolvedServerOptions {
  const health = resolveHealthConfig(options.health)

  return {
    port: options.port,
    host: options.host ?? DEFAULTS.host,
    startupTimeoutMs: options.startupTimeoutMs ?? DEFAULTS.startupTimeoutMs,
    shutdownTimeoutMs: options.shutdownTimeoutMs ?? DEFAULTS.shutdownTimeoutMs,
    requestId: resolveRequestIdConfig(options.requestId),
    requestLogging: resolveRequestLoggingConfig(options.requestLogging, health),
    health,
    errorHandling: options.errorHandling,
    routes: options.routes,
    startHooks: options.startHooks ?? [],
    stopHooks: options.stopHooks ?? [],
  }
}

function resolveHealthConfig(config: HealthConfig | undefined): ResolvedHealthConfig {
  if (config?.enabled === false) return { enabled: false }

  return { ...DEFAULTS.health, ...config, enabled: true }
}

function resolveRequestIdConfig(config: RequestIdConfig | undefined): ResolvedRequestIdConfig {
  if (config?.enabled === false) return { enabled: false }

  return { ...DEFAULTS.requestId, ...config, enabled: true }
}

function resolveRequestLoggingConfig(
  config: RequestLoggingConfig | undefined,
  health: ResolvedHealthConfig,
): ResolvedRequestLoggingConfig {
  if (config?.enabled === false) return { enabled: false }

  return {
    enabled: true,
    level: config?.level ?? DEFAULTS.requestLoggingLevel,
    ignorePaths:
      config?.ignorePaths ?? (health.enabled ? [health.livenessPath, health.readinessPath] : []),
  }
}
