import type { Clock, Milliseconds } from "../../clock"
import type { Logger } from "../../logger"
import type { HookFailure, HookRunResult, LifecycleHook } from "./lifecycle-hook"

export type HookPhase = "startup" | "shutdown"

export type RunHooksContext = {
  phase: HookPhase
  clock: Clock
  logger: Logger
  deadlineMs: Milliseconds
}

type HookAttempt = { failure?: HookFailure; timedOut: boolean }

/**
 * Runs hooks in order against a shared deadline. With `failFast` the
 * first failure stops the run; otherwise every hook gets its turn.
 */
export async function runHooks(
  ctx: RunHooksContext,
  hooks: readonly LifecycleHook[],
  failFast: boolean,
): Promise<HookRunResult> {
  const failures: HookFailure[] = []

  for (const hook of hooks) {
    const attempt = await runOne(ctx, hook)

    if (attempt.failure) {
      failures.push(attempt.failure)
      if (failFast) return { ok: false, failures, timedOut: attempt.timedOut }
    }

    if (attempt.timedOut) return { ok: false, failures, timedOut: true }
  }

  return { ok: failures.length === 0, failures, timedOut: false }
}

async function runOne(ctx: RunHooksContext, hook: LifecycleHook): Promise<HookAttempt> {
  const remaining = Math.max(0, ctx.deadlineMs - ctx.clock.nowMs())

  if (remaining <= 0) {
    ctx.logger.warn(`Skipping remaining ${ctx.phase} hooks, deadline reached`)
    return { timedOut: true }
  }

  const controller = new AbortController()
  const timer = setTimeout(() => controller.abort(), remaining)
  const deadlineHit = () => controller.signal.aborted || ctx.clock.nowMs() >= ctx.deadlineMs

  try {
    await hook.fn({ signal: controller.signal, timeRemainingMs: remaining })

    if (deadlineHit()) {
      ctx.logger.warn(`${ctx.phase} deadline exceeded during hook ${hook.name}`)
      return { timedOut: true }
    }

    ctx.logger.info(`Executed ${ctx.phase} hook ${hook.name}`)
    return { timedOut: false }
  } catch (err) {
    ctx.logger.error(`${ctx.phase} hook ${hook.name} failed`, { err })
    return { failure: { hook: hook.name, error: err }, timedOut: deadlineHit() }
  } finally {
    clearTimeout(timer)
  }
}
