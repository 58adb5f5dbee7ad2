import { createRedisClient, type RedisBytesClient } from "../../lib/redis"
import type { AppConfig } from "../config"

export type InfraClients = {
  redisClient: RedisBytesClient
}

/** The client is created lazily by node-redis; it connects in a start hook. */
export function createDefaultInfraClients(config: AppConfig): InfraClients {
  const redisClient = createRedisClient({ url: config.redis.url })

  return { redisClient }
}
