export type DeepPartial<T> = {
  [P in keyof T]?: T[P] extends object ? DeepPartial<T[P]> | T[P] : T[P]
}

/**
 * Deep-merges plain object literals from `overrides` into `base`.
 * Anything else (class instances, arrays, dates, functions) is replaced whole.
 */
export function applyOverrides<T extends object>(base: T, overrides?: DeepPartial<T>): T {
  if (!overrides) return base

  // The merge walks keys generically; the result keeps base's shape.
  return merge(base, overrides) as T
}

function merge(base: object, overrides: object): Record<string, unknown> {
  const result: Record<string, unknown> = { ...base }

  for (const [key, value] of Object.entries(overrides)) {
    if (value === undefined) continue

    const current = result[key]
    result[key] = isPlainObject(current) && isPlainObject(value) ? merge(current, value) : value
  }

  return result
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (typeof value !== "object" || value === null || Array.isArray(value)) return false

  const proto: unknown = Object.getPrototypeOf(value)
  return proto === Object.prototype || proto === null
}
