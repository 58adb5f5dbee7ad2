declare const brand: unique symbol

/** Nominal wrapper so ids of different kinds cannot be mixed up. */
export type Brand<T, Name extends string> = T & { readonly [brand]: Name }

/** Recognises and parses one kind of id where data crosses a boundary. */
export interface IdType<T> {
  readonly kind: string

  /** @throws ValidationError when `value` is not a valid id of this kind */
  parse(value: unknown): T

  is(value: unknown): value is T
}

export interface IdGenerator<T> {
  generate(): T
}

export type IdCodec<T> = IdType<T> & IdGenerator<T>

export const withGenerator = <T>(type: IdType<T>, generator: IdGenerator<T>): IdCodec<T> => ({
  ...type,
  ...generator,
})
