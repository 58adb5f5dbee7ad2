import type { Clock, Milliseconds } from "../../clock"
import type { Logger } from "../../logger"
import type { HookRunResult, LifecycleHook } from "./lifecycle-hook"
import { runHooks } from "./run-hooks"

export interface Closeable {
  close: (callback?: (err?: Error | null) => void) => void
}

export type ShutdownContext = {
  server: Closeable
  clock: Clock
  logger: Logger
  deadlineMs: Milliseconds
  stopHooks: LifecycleHook[]
}

/** `timedOut` means hooks were skipped or aborted, not that sockets were killed. */
export type StopResult = HookRunResult

export async function shutdown(ctx: ShutdownContext): Promise<StopResult> {
  ctx.logger.warn("Shutting down gracefully")

  const result = await runHooks(
    { phase: "shutdown", clock: ctx.clock, logger: ctx.logger, deadlineMs: ctx.deadlineMs },
    [closeServerHook(ctx.server), ...ctx.stopHooks],
    false,
  )

  ctx.logger.info("Shutdown complete")

  return result
}

function closeServerHook(server: Closeable): LifecycleHook {
  return {
    name: "server.close",
    fn: ({ signal }) =>
      new Promise<void>((resolve, reject) => {
        if (signal.aborted) return resolve()

        const onAbort = () => resolve()
        signal.addEventListener("abort", onAbort, { once: true })

        server.close((err) => {
          signal.removeEventListener("abort", onAbort)
          if (err) reject(err)
          else resolve()
        })
      }),
  }
}

export type ShutdownFn = typeof shutdown
