import type { LifecycleHook } from "../../lib/server"
import type { AppContext } from "../create-context"

export function createStopHooks(context: AppContext): LifecycleHook[] {
  if (context.config.jobs.store !== "redis") return []

  return [
    {
      name: "stop:redis",
      fn: async () => {
        if (context.infra.redisClient.isOpen) await context.infra.redisClient.quit()
      },
    },
  ]
}

export type CreateStopHooksFn = typeof createStopHooks
