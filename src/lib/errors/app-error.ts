export type ErrorCode = Lowercase<string>

/** Structured data attached to an error (ids, rejected values, limits). */
export type ErrorContext = Readonly<Record<string, unknown>>

export interface AppError extends Error {
  readonly code: ErrorCode
  readonly context: ErrorContext

  /** `true` when repeating the same operation may succeed. */
  readonly isRetryable: boolean

  /**
   * `true` for expected failures (bad input, missing record, lost race),
   * `false` for bugs and broken invariants.
   */
  readonly isOperational: boolean

  readonly timestamp: Date
  readonly cause?: unknown
}

/** JSON-safe error shape used in logs. */
export type SerializedError = Readonly<{
  name: string
  code: string
  message: string
  context: Record<string, unknown>
  timestamp: string
  isOperational: boolean
  cause?: SerializedError
  stack?: string
}>
