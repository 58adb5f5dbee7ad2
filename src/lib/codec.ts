import superjson from "superjson"

/** Bidirectional mapping between a typed value and stored bytes. */
export interface Codec<T> {
  encode(value: T): Uint8Array
  decode(bytes: Uint8Array): T
}

const decoder = new TextDecoder()

/** JSON codec that keeps `Date`, `Map` and `Set` values intact. */
export function createJsonCodec<T>(): Codec<T> {
  return {
    encode: (value: T) => Buffer.from(superjson.stringify(value), "utf8"),
    decode: (data: Uint8Array) => superjson.parse<T>(decoder.decode(data)),
  }
}
