export { createRedisClient, type RedisBytesClient, type RedisBytesClientOptions } from "./redis-client"
