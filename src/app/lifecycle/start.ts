import type { LifecycleHook } from "../../lib/server"
import type { AppContext } from "../create-context"

export function createStartHooks(context: AppContext): LifecycleHook[] {
  const hooks: LifecycleHook[] = []

  if (context.config.jobs.store === "redis") {
    hooks.push({
      name: "start:redis",
      fn: async () => {
        await context.infra.redisClient.connect()
      },
    })
  }

  hooks.push({
    name: "start:jobs:process-catalog",
    fn: async () => {
      const summary = await context.services.domains.jobs.catalog.load()
      context.services.core.logger.info("Process catalog loaded", summary)
    },
  })

  return hooks
}

export type CreateStartHooksFn = typeof createStartHooks
