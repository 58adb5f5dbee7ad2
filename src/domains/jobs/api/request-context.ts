import type { AppConfig } from "../../../app/config"
import { ValidationError } from "../../../lib/errors"
import type { Context } from "../../../lib/server"
import { JobError } from "../model/job.errors"
import { JobId } from "../model/job.model"
import type { JobListScope } from "../model/job-query.model"
import { ProcessError } from "../model/process.model"
import type { QueryPairs } from "../services/job-links"
import type { JobPathScope } from "../services/job-listing"

export const API_PREFIX = "/api/v1"

/** Absolute API root used in hyperlinks. */
export function apiBaseUrl(c: Context, config: AppConfig): string {
  const origin = config.server.publicBaseUrl ?? new URL(c.req.url).origin
  return `${origin}${API_PREFIX}`
}

function param(c: Context, name: string): string | undefined {
  const value: string | undefined = c.req.param(name)
  return value === "" ? undefined : value
}

/** Malformed ids are reported as unknown jobs. */
export function jobIdParam(c: Context): JobId {
  return toJobId(param(c, "jobId") ?? "")
}

export function toJobId(raw: string): JobId {
  const normalized = raw.trim().toLowerCase()
  if (!JobId.is(normalized)) throw JobError.notFound(raw)

  return JobId.parse(normalized)
}

export function processIdParam(c: Context): string {
  const processId = param(c, "processId")
  if (processId === undefined) throw ProcessError.processNotFound("")

  return processId
}

export function pathScope(c: Context): JobPathScope {
  const processId = param(c, "processId")
  const providerId = param(c, "providerId")

  return {
    ...(processId !== undefined && { processId }),
    ...(providerId !== undefined && { providerId }),
  }
}

export function listingScope(c: Context): JobListScope {
  const { processId, providerId } = pathScope(c)

  if (processId !== undefined && providerId !== undefined) {
    return { kind: "provider-process", providerId, processId }
  }
  if (processId !== undefined) return { kind: "process", processId }
  if (providerId !== undefined) return { kind: "provider", providerId }

  return { kind: "global" }
}

/** Query parameters in request order, already percent-decoded. */
export function queryPairs(c: Context): QueryPairs {
  return [...new URL(c.req.url).searchParams]
}

/** First value of each parameter. */
export function firstValues(pairs: QueryPairs): Record<string, string> {
  const values: Record<string, string> = {}

  for (const [key, value] of pairs) {
    if (!(key in values)) values[key] = value
  }

  return values
}

/** Parses a JSON request body; an empty body reads as `{}`. */
export async function readJsonBody(c: Context): Promise<unknown> {
  const text = await c.req.text()
  if (text.trim() === "") return {}

  try {
    return JSON.parse(text)
  } catch (err) {
    throw new ValidationError("Request body is not valid JSON", { code: "validation_error", cause: err })
  }
}
