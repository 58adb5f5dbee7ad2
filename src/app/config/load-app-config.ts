import path from "node:path"
import { type ConfigSource, DotenvSource, EnvSource, loadConfig } from "../../lib/config"
import { applyOverrides, type DeepPartial } from "../../lib/server"
import { type AppConfig, type EnvConfig, envSchema } from "./schema"

export function mapEnvToConfig(env: EnvConfig, cwd: string): AppConfig {
  return {
    app: {
      env: env.APP_ENV,
    },
    server: {
      host: env.SERVER_HOST,
      port: env.SERVER_PORT,
      startupTimeoutMs: env.SERVER_STARTUP_TIMEOUT_MS,
      shutdownTimeoutMs: env.SERVER_SHUTDOWN_TIMEOUT_MS,
      readinessCheckTimeoutMs: env.SERVER_READINESS_CHECK_TIMEOUT_MS,
      livenessPath: env.SERVER_LIVENESS_PATH,
      readinessPath: env.SERVER_READINESS_PATH,
      ...(env.PUBLIC_BASE_URL !== undefined && {
        publicBaseUrl: env.PUBLIC_BASE_URL.replace(/\/+$/, ""),
      }),
    },
    logging: {
      level: env.LOG_LEVEL,
      prettify: env.LOG_PRETTY,
      serviceName: env.SERVICE_NAME,
    },
    requestId: {
      enabled: env.REQUEST_ID_ENABLED,
      header: env.REQUEST_ID_HEADER,
      fallbackToTraceparent: env.REQUEST_ID_FALLBACK_TO_TRACEPARENT,
    },
    requestLogging: {
      enabled: env.REQUEST_LOGGING_ENABLED,
      level: env.REQUEST_LOGGING_LEVEL,
    },
    jobs: {
      store: env.JOBS_STORE,
      sync: {
        maxWaitSeconds: env.JOBS_SYNC_MAX_WAIT_SECONDS,
        pollIntervalMs: env.JOBS_SYNC_POLL_INTERVAL_MS,
      },
      paging: {
        defaultLimit: env.JOBS_PAGE_LIMIT_DEFAULT,
        maxLimit: env.JOBS_PAGE_LIMIT_MAX,
      },
      maxWriteAttempts: env.JOBS_WRITE_MAX_ATTEMPTS,
      notificationSecret: env.JOBS_NOTIFICATION_SECRET,
      catalogFile: path.resolve(cwd, env.PROCESS_CATALOG_FILE),
      ...(env.JOBS_RUNNER_TOKEN !== undefined && { runnerToken: env.JOBS_RUNNER_TOKEN }),
    },
    identity: {
      userHeader: env.IDENTITY_USER_HEADER.toLowerCase(),
      rolesHeader: env.IDENTITY_ROLES_HEADER.toLowerCase(),
      adminRole: env.IDENTITY_ADMIN_ROLE,
    },
    redis: {
      url: env.REDIS_URL,
      keyPrefix: env.REDIS_KEY_PREFIX,
    },
  }
}

export async function loadAppConfig(
  env: NodeJS.ProcessEnv,
  overrides?: DeepPartial<AppConfig>,
  cwd: string = process.cwd(),
): Promise<AppConfig> {
  const nodeEnv = env.NODE_ENV ?? "development"

  const sources: ConfigSource[] = [
    new DotenvSource({ file: `.env.${nodeEnv}`, required: false, cwd }),
    new EnvSource({ env }),
  ]

  const parsed = await loadConfig({ schema: envSchema, sources })
  const config = mapEnvToConfig(parsed, cwd)

  return overrides ? applyOverrides(config, overrides) : config
}
