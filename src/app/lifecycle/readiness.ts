import type { RedisBytesClient } from "../../lib/redis"
import type { ReadinessCheck } from "../../lib/server"
import type { AppContext } from "../create-context"

export function createReadinessChecks(context: AppContext): ReadinessCheck[] {
  if (context.config.jobs.store !== "redis") return []

  const { redisClient } = context.infra

  return [
    {
      name: "redis",
      fn: async (signal) => redisClient.isOpen && (await ping(redisClient, signal)),
    },
  ]
}

/** Settles with false once `signal` aborts, so a hung connection reads as a timeout. */
function ping(client: RedisBytesClient, signal: AbortSignal): Promise<boolean> {
  return new Promise<boolean>((resolve, reject) => {
    if (signal.aborted) return resolve(false)

    const onAbort = () => resolve(false)
    signal.addEventListener("abort", onAbort, { once: true })

    void client.ping().then(
      (reply) => {
        signal.removeEventListener("abort", onAbort)
        resolve(reply === "PONG")
      },
      (err: unknown) => {
        signal.removeEventListener("abort", onAbort)
        reject(err)
      },
    )
  })
}

export type CreateReadinessChecksFn = typeof createReadinessChecks
