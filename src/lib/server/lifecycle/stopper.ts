import type { ResolvedServerOptions, ServerDependencies } from "../server-options"
import type { Closeable, ShutdownFn, StopResult } from "./shutdown"

export interface ServerHandle {
  stop(): Promise<StopResult>
  address: { host: string; port: number }
}

export interface StopperContext {
  server: Closeable
  deps: ServerDependencies
  options: ResolvedServerOptions
  shutdown: ShutdownFn
  setReady: (value: boolean) => void
  onStop: () => void
}

/** Wraps a listening server so repeated `stop()` calls share one shutdown. */
export function createStopper(ctx: StopperContext): ServerHandle {
  let stopping: Promise<StopResult> | undefined

  const run = async (): Promise<StopResult> => {
    ctx.setReady(false)
    try {
      return await ctx.shutdown({
        server: ctx.server,
        clock: ctx.deps.clock,
        logger: ctx.deps.logger,
        deadlineMs: ctx.deps.clock.nowMs() + ctx.options.shutdownTimeoutMs,
        stopHooks: ctx.options.stopHooks,
      })
    } finally {
      ctx.onStop()
    }
  }

  return {
    stop: () => {
      stopping ??= run()
      return stopping
    },
    address: { host: ctx.options.host, port: ctx.options.port },
  }
}
