import pino, { type Logger as PinoBase, type LoggerOptions as PinoOptions } from "pino"
import { errWithCause } from "pino-std-serializers"
import type { LogContext, LogContextPatch, LogMeta } from "../ports/log-context"
import type { Logger, LoggerOptions } from "../ports/logger"

export class PinoLogger<TContext extends LogContext = LogContext> implements Logger<TContext> {
  protected readonly logger: PinoBase

  constructor(
    protected readonly opts: Partial<LoggerOptions> = {},
    bindings: LogContextPatch = {},
    base?: PinoBase,
  ) {
    this.logger = base ? base.child(bindings) : PinoLogger.root(opts).child(bindings)
  }

  private static root(opts: Partial<LoggerOptions>): PinoBase {
    const pinoOpts: PinoOptions = {
      ...(opts.level && { level: opts.level }),
      serializers: { err: errWithCause },
      ...(opts.prettify && {
        transport: {
          target: "pino-pretty",
          options: { colorize: true, translateTime: "HH:MM:ss.l", ignore: "hostname,pid" },
        },
      }),
    }

    return pino(pinoOpts)
  }

  trace(message: string, meta?: LogMeta<TContext>): void {
    this.logger.trace(meta ?? {}, message)
  }

  debug(message: string, meta?: LogMeta<TContext>): void {
    this.logger.debug(meta ?? {}, message)
  }

  info(message: string, meta?: LogMeta<TContext>): void {
    this.logger.info(meta ?? {}, message)
  }

  warn(message: string, meta?: LogMeta<TContext>): void {
    this.logger.warn(meta ?? {}, message)
  }

  error(message: string, meta?: LogMeta<TContext>): void {
    this.logger.error(meta ?? {}, message)
  }

  fatal(message: string, meta?: LogMeta<TContext>): void {
    this.logger.fatal(meta ?? {}, message)
  }

  child<U extends LogContextPatch>(context: U): Logger<TContext & U> {
    return new PinoLogger<TContext & U>(this.opts, context, this.logger)
  }
}
