export { NullLogger } from "./adapters/null-logger"
export { PinoLogger } from "./adapters/pino-logger"
export type { LogContext, LogContextPatch, LogMeta } from "./ports/log-context"
export { type LogLevelName, logLevelNames } from "./ports/log-level"
export type { Logger, LoggerOptions } from "./ports/logger"
