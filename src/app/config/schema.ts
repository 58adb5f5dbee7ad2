import { z } from "zod/mini"
import type { Milliseconds } from "../../lib/clock"
import { type LogLevelName, logLevelNames } from "../../lib/logger"

const flag = (fallback: boolean) => z._default(z.stringbool(), fallback)
const count = (fallback: number) => z._default(z.coerce.number().check(z.gt(0), z.multipleOf(1)), fallback)
const urlPath = (fallback: `/${string}`) =>
  z._default(
    z.custom<`/${string}`>((value) => typeof value === "string" && value.startsWith("/")),
    fallback,
  )

export const envSchema = z.object({
  APP_ENV: z._default(z.string(), "development"),
  SERVICE_NAME: z._default(z.string(), "Process Jobs Service"),
  SERVER_HOST: z._default(z.string(), "0.0.0.0"),

  SERVER_PORT: z._default(z.coerce.number(), 4001),
  SERVER_SHUTDOWN_TIMEOUT_MS: z._default(z.coerce.number(), 10_000),
  SERVER_STARTUP_TIMEOUT_MS: count(30_000),
  SERVER_READINESS_CHECK_TIMEOUT_MS: count(2_000),
  SERVER_LIVENESS_PATH: urlPath("/health/live"),
  SERVER_READINESS_PATH: urlPath("/health/ready"),
  PUBLIC_BASE_URL: z.optional(z.url()),

  LOG_LEVEL: z._default(z.enum(logLevelNames), "info"),
  LOG_PRETTY: flag(false),

  REQUEST_ID_ENABLED: flag(true),
  REQUEST_ID_HEADER: z._default(z.string(), "x-request-id"),
  REQUEST_ID_FALLBACK_TO_TRACEPARENT: flag(false),

  REQUEST_LOGGING_ENABLED: flag(true),
  REQUEST_LOGGING_LEVEL: z._default(z.enum(logLevelNames), "info"),

  JOBS_STORE: z._default(z.enum(["memory", "redis"]), "memory"),
  JOBS_SYNC_MAX_WAIT_SECONDS: count(20),
  JOBS_SYNC_POLL_INTERVAL_MS: count(1000),
  JOBS_PAGE_LIMIT_DEFAULT: count(10),
  JOBS_PAGE_LIMIT_MAX: count(1000),
  JOBS_WRITE_MAX_ATTEMPTS: count(5),
  JOBS_NOTIFICATION_SECRET: z._default(z.string().check(z.minLength(1)), "development-notification-secret"),
  JOBS_RUNNER_TOKEN: z.optional(z.string().check(z.minLength(1))),
  PROCESS_CATALOG_FILE: z._default(z.string(), "config/processes.json"),

  IDENTITY_USER_HEADER: z._default(z.string(), "x-user-id"),
  IDENTITY_ROLES_HEADER: z._default(z.string(), "x-user-roles"),
  IDENTITY_ADMIN_ROLE: z._default(z.string(), "admin"),

  REDIS_URL: z._default(z.string(), "redis://localhost:6379"),
  REDIS_KEY_PREFIX: z._default(z.string(), "app:process-jobs"),
})

export type EnvConfig = z.infer<typeof envSchema>

export type JobStoreKind = EnvConfig["JOBS_STORE"]

export type AppConfig = {
  app: {
    env: string
  }

  server: {
    host: string
    port: number
    startupTimeoutMs: Milliseconds
    shutdownTimeoutMs: Milliseconds
    readinessCheckTimeoutMs: Milliseconds
    livenessPath: `/${string}`
    readinessPath: `/${string}`
    /** Origin used in hyperlinks; the request origin when unset. */
    publicBaseUrl?: string
  }

  logging: {
    level: LogLevelName
    prettify: boolean
    serviceName: string
  }

  requestId: {
    enabled: boolean
    header: string
    fallbackToTraceparent: boolean
  }

  requestLogging: {
    enabled: boolean
    level: LogLevelName
  }

  jobs: {
    store: JobStoreKind
    sync: {
      maxWaitSeconds: number
      pollIntervalMs: Milliseconds
    }
    paging: {
      defaultLimit: number
      maxLimit: number
    }
    maxWriteAttempts: number
    notificationSecret: string
    runnerToken?: string
    catalogFile: string
  }

  identity: {
    userHeader: string
    rolesHeader: string
    adminRole: string
  }

  redis: {
    url: string
    keyPrefix: string
  }
}
