import { Hono } from "hono"
import { BaseError } from "../errors"
import { createErrorHandler } from "./errors/error-handler"
import { type ListenFn, listen } from "./lifecycle/listen"
import { type ShutdownFn, type StopResult, shutdown } from "./lifecycle/shutdown"
import { type SignalHandler, setupProcessHandlers } from "./lifecycle/signals"
import { type StartupFn, startup } from "./lifecycle/startup"
import { createStopper, type ServerHandle } from "./lifecycle/stopper"
import { requestIdMiddleware } from "./middleware/request-id"
import { requestLoggerMiddleware } from "./middleware/request-logger"
import { requestLoggingMiddleware } from "./middleware/request-logging"
import { registerHealthRoutes } from "./routes/health"
import {
  type ResolvedServerOptions,
  resolveOptions,
  type ServerDependencies,
  type ServerOptions,
} from "./server-options"
import type { Application, Router } from "./types/http"

export type ServerState = "idle" | "starting" | "started"

export interface ServerCollaborators {
  startup: StartupFn
  shutdown: ShutdownFn
  listen: ListenFn
}

const defaultCollaborators: ServerCollaborators = { startup, shutdown, listen }

export function createApp(): Application {
  return new Hono()
}

export function createRouter(): Router {
  return new Hono()
}

export class Server {
  readonly app: Application = createApp()

  private state: ServerState = "idle"
  private ready = false
  private built = false
  private handle?: ServerHandle
  private signalHandler?: SignalHandler

  constructor(
    private readonly deps: ServerDependencies,
    private readonly options: ResolvedServerOptions,
    private readonly collabs: ServerCollaborators = defaultCollaborators,
  ) {}

  /**
   * Registers health routes, middleware, application routes and the error
   * handler on `app`. Safe to call more than once.
   */
  build(): Application {
    if (this.built) return this.app
    this.built = true

    const { app, options } = this
    const { logger, clock } = this.deps

    registerHealthRoutes(app, options.health, () => this.ready)

    if (options.requestId.enabled) app.use("*", requestIdMiddleware(options.requestId))
    app.use("*", requestLoggerMiddleware(logger))
    if (options.requestLogging.enabled) {
      app.use("*", requestLoggingMiddleware(options.requestLogging, { logger, clock }))
    }

    options.routes(app)
    app.onError(createErrorHandler(options.errorHandling, logger))

    return app
  }

  setupProcessHandlers(): this {
    if (this.signalHandler) return this

    this.signalHandler = setupProcessHandlers({
      logger: this.deps.logger,
      stop: () => this.handle?.stop() ?? this.noopStop(),
    })

    return this
  }

  async start(): Promise<ServerHandle> {
    if (this.state !== "idle") {
      throw new BaseError("Server already started", { code: "server_state", isOperational: false })
    }

    this.state = "starting"

    try {
      await this.collabs.startup({
        clock: this.deps.clock,
        logger: this.deps.logger,
        deadlineMs: this.deps.clock.nowMs() + this.options.startupTimeoutMs,
        startHooks: this.options.startHooks,
      })

      const nodeServer = this.collabs.listen(this.build(), this.options, this.deps.logger)

      this.handle = createStopper({
        server: nodeServer,
        deps: this.deps,
        options: this.options,
        shutdown: this.collabs.shutdown,
        setReady: (value) => {
          this.ready = value
        },
        onStop: () => this.signalHandler?.unregister(),
      })

      this.ready = true
      this.state = "started"

      return this.handle
    } catch (err) {
      this.state = "idle"
      this.ready = false
      throw err
    }
  }

  getState(): ServerState {
    return this.state
  }

  isReady(): boolean {
    return this.ready
  }

  private noopStop(): Promise<StopResult> {
    this.deps.logger.warn("Stop called but server not running")
    return Promise.resolve({ ok: true, failures: [], timedOut: false })
  }
}

export function createServer(deps: ServerDependencies, options: ServerOptions): Server {
  return new Server(deps, resolveOptions(options))
}
