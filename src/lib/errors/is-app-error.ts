import type { AppError } from "./app-error"

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null
}

/**
 * Structural check, so errors raised by another copy of this module
 * (or by a library following the same contract) are recognised too.
 */
export function isAppError(value: unknown): value is AppError {
  if (!(value instanceof Error) || !isRecord(value)) return false

  return (
    typeof value.code === "string" &&
    isRecord(value.context) &&
    typeof value.isRetryable === "boolean" &&
    typeof value.isOperational === "boolean" &&
    value.timestamp instanceof Date &&
    Number.isFinite(value.timestamp.valueOf())
  )
}
