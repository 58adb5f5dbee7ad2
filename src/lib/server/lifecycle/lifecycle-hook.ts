import type { Milliseconds } from "../../clock"

export interface LifecycleHookContext {
  signal: AbortSignal
  timeRemainingMs: Milliseconds
}

export interface LifecycleHook {
  name: string
  fn: (ctx: LifecycleHookContext) => Promise<void>
}

export interface HookFailure {
  hook: string
  error: unknown
}

export type HookRunResult = {
  ok: boolean
  failures: HookFailure[]
  timedOut: boolean
}
