import type { ContentfulStatusCode } from "hono/utils/http-status"
import { type AppError, type ErrorCode, isAppError } from "../../errors"

export type ErrorStatus = ContentfulStatusCode

export type ErrorMapping = {
  status: ErrorStatus

  /** Shown to clients; keep free of internals. */
  message: string
}

export type FallbackMapping = ErrorMapping & {
  code: ErrorCode
}

/** Extra fields merged into the response body. Return undefined to add none. */
export type ErrorContextTransformer = (error: AppError) => Record<string, unknown> | undefined

export interface ErrorMappingsConfig {
  /** Unmapped codes keep their code but take the fallback status and message. */
  mappings: Partial<Record<ErrorCode, ErrorMapping>>
  fallback?: FallbackMapping
  transformContext?: ErrorContextTransformer
}

export type ErrorResponseBody = {
  status: ErrorStatus
  code: ErrorCode
  message: string
  requestId: string
  [key: string]: unknown
}

export type ErrorResponse = {
  error: ErrorResponseBody
}

export type ErrorFormatter = (error: unknown, requestId: string) => ErrorResponse

const DEFAULT_FALLBACK: FallbackMapping = {
  code: "internal_error",
  status: 500,
  message: "An unexpected error occurred",
}

export function createErrorFormatter(config: ErrorMappingsConfig): ErrorFormatter {
  const fallback = config.fallback ?? DEFAULT_FALLBACK

  return (error, requestId) => {
    if (!isAppError(error)) {
      return {
        error: {
          code: fallback.code,
          status: fallback.status,
          message: fallback.message,
          requestId,
        },
      }
    }

    const mapping = config.mappings[error.code]
    const extra = transform(config, error)

    return {
      error: {
        ...extra,
        code: error.code,
        status: mapping?.status ?? fallback.status,
        message: mapping?.message ?? fallback.message,
        requestId,
      },
    }
  }
}

function transform(config: ErrorMappingsConfig, error: AppError): Record<string, unknown> {
  try {
    return config.transformContext?.(error) ?? {}
  } catch {
    // A failing transformer must not mask the original error.
    return {}
  }
}
