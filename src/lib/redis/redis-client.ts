import { createClient, RESP_TYPES, type RedisClientOptions } from "redis"

/**
 * The slice of the node-redis client the service uses. Bulk strings are
 * mapped to `Buffer` so stored bytes come back untouched.
 */
export type RedisBytesClient = {
  mGet(keys: readonly string[]): Promise<(Buffer | null)[]>
  sMembers(key: string): Promise<Buffer[]>
  eval(script: string, opts: { keys: string[]; arguments: (string | Buffer)[] }): Promise<unknown>

  ping(): Promise<string>
  connect(): Promise<unknown>
  quit(): Promise<unknown>
  isOpen: boolean
}

export type RedisBytesClientOptions = { url: string } & Omit<RedisClientOptions, "url">

export function createRedisClient(options: RedisBytesClientOptions): RedisBytesClient {
  return createClient({ ...options, url: options.url }).withTypeMapping({
    [RESP_TYPES.BLOB_STRING]: Buffer,
  }) as unknown as RedisBytesClient
}
