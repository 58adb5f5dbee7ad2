import type { Clock, Milliseconds } from "../../clock"
import { BaseError } from "../../errors"
import type { Logger } from "../../logger"
import type { LifecycleHook } from "./lifecycle-hook"
import { runHooks } from "./run-hooks"

export type StartupContext = {
  clock: Clock
  logger: Logger
  deadlineMs: Milliseconds
  startHooks: LifecycleHook[]
}

/** Runs start hooks fail-fast and throws when any of them did not complete. */
export async function startup(ctx: StartupContext): Promise<void> {
  ctx.logger.debug("Running startup hooks")

  const result = await runHooks(
    { phase: "startup", clock: ctx.clock, logger: ctx.logger, deadlineMs: ctx.deadlineMs },
    ctx.startHooks,
    true,
  )

  if (result.ok) return

  const failed = result.failures[0]
  throw new BaseError(
    result.timedOut ? "Startup timed out" : `Startup hook ${failed?.hook ?? "unknown"} failed`,
    {
      code: "startup_failed",
      isOperational: false,
      context: { hooks: result.failures.map((f) => f.hook), timedOut: result.timedOut },
      cause: failed?.error,
    },
  )
}

export type StartupFn = typeof startup
