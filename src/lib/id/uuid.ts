import { validate, version, v4 } from "uuid"
import { ValidationError } from "../errors"
import { type Brand, type IdCodec, withGenerator } from "./id-type"

export const isUuid = (value: unknown): value is string =>
  typeof value === "string" && validate(value)

/**
 * Builds a branded id kind backed by random (v4) UUIDs. Ids are stored
 * lower-cased so lookups are case-insensitive.
 */
export function uuidIdType<Name extends string>(kind: Name): IdCodec<Brand<string, Name>> {
  const is = (value: unknown): value is Brand<string, Name> =>
    isUuid(value) && value === value.toLowerCase() && version(value) === 4

  const parse = (value: unknown): Brand<string, Name> => {
    const normalized = typeof value === "string" ? value.toLowerCase() : value
    if (!is(normalized)) {
      throw new ValidationError(`Invalid ${kind}`, {
        code: "validation_error",
        context: { kind, value },
      })
    }
    return normalized
  }

  return withGenerator({ kind, is, parse }, { generate: () => parse(v4()) })
}
