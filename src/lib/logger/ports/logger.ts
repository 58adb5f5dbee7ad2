import type { LogContext, LogContextPatch, LogMeta } from "./log-context"
import type { LogLevelName } from "./log-level"

export type LoggerOptions = {
  /** Entries below this level are dropped. */
  level: LogLevelName

  /** Human-readable output for local runs. Leave off where logs are shipped. */
  prettify?: boolean
}

export interface Logger<TContext extends LogContext = LogContext> {
  trace(message: string, meta?: LogMeta<TContext>): void
  debug(message: string, meta?: LogMeta<TContext>): void
  info(message: string, meta?: LogMeta<TContext>): void
  warn(message: string, meta?: LogMeta<TContext>): void
  error(message: string, meta?: LogMeta<TContext>): void
  fatal(message: string, meta?: LogMeta<TContext>): void

  /** Returns a logger whose entries all carry `context` on top of the parent's. */
  child<U extends LogContextPatch>(context: U): Logger<TContext & U>
}
