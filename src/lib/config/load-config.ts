import { type ZodMiniType, z } from "zod/mini"
import { BaseError } from "../errors"
import { EnvSource } from "./env-source"
import type { ConfigSource } from "./source"

export type LoadConfigOptions<T> = {
  schema: ZodMiniType<T>
  sources?: ConfigSource[]
}

/** Merges `sources` in order, dropping undefined values, then validates. */
export async function loadConfig<T>({ schema, sources }: LoadConfigOptions<T>): Promise<T> {
  const merged: Record<string, unknown> = {}

  for (const source of sources ?? [new EnvSource()]) {
    const values = await source.load()

    for (const [key, value] of Object.entries(values)) {
      if (value !== undefined) merged[key] = value
    }
  }

  const result = schema.safeParse(merged)

  if (!result.success) {
    throw new BaseError(`Configuration validation failed:\n${z.prettifyError(result.error)}`, {
      code: "invalid_config",
      isOperational: false,
      cause: result.error,
    })
  }

  return result.data
}
