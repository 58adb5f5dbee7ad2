import { z } from "zod/mini"
import type { RequestIdentity } from "../model/identity.model"
import { JobError } from "../model/job.errors"
import { type JobAccess, jobAccessValues } from "../model/job.model"
import {
  type DatetimeInterval,
  type JobGroupField,
  type JobListScope,
  type JobQuerySpec,
  type JobSortKey,
  type JobType,
  jobGroupFields,
  jobSortKeys,
} from "../model/job-query.model"
import { type JobStatus, jobStatuses, resolveJobStatus, statusFilterCategories } from "../model/job-status"
import type { NotificationTransform } from "./notification-transform"

/** Listing parameters after schema parsing and alias folding. */
export type JobListParams = {
  process?: string
  provider?: string
  type?: string
  status?: string
  tags?: string
  access?: string
  notification?: string
  datetime?: string
  minDuration?: number
  maxDuration?: number
  groups?: string
  sort?: string
  page: number
  limit: number
}

const OPEN_BOUND = ".."

const instant = z.union([z.iso.datetime({ offset: true }), z.iso.date()])

function splitList(value: string): string[] {
  return value
    .split(",")
    .map((token) => token.trim())
    .filter((token) => token.length > 0)
}

function pick<T extends string>(allowed: readonly T[], value: string): T | undefined {
  return allowed.find((candidate) => candidate === value)
}

function parseInstant(raw: string, original: string): Date {
  const parsed = instant.safeParse(raw)
  if (!parsed.success) throw JobError.invalidFilter("datetime", original, `'${raw}' is not an ISO-8601 instant`)

  return new Date(parsed.data)
}

/**
 * Parses `instant`, `start/end`, `../end` or `start/..`. Query decoding
 * turns `+` offsets into spaces; they are restored first.
 */
export function parseDatetimeInterval(value: string): DatetimeInterval {
  const text = value.trim().replaceAll(" ", "+")
  const parts = text.split("/")

  if (parts.length === 1) return { kind: "match", at: parseInstant(text, value) }
  if (parts.length !== 2) throw JobError.invalidFilter("datetime", value, "expected at most one '/'")

  const [start = "", end = ""] = parts
  const startOpen = start === "" || start === OPEN_BOUND
  const endOpen = end === "" || end === OPEN_BOUND

  if (startOpen && endOpen) throw JobError.invalidFilter("datetime", value, "both bounds are open")
  if (startOpen) return { kind: "before", before: parseInstant(end, value) }
  if (endOpen) return { kind: "after", after: parseInstant(start, value) }

  const after = parseInstant(start, value)
  const before = parseInstant(end, value)
  if (after.getTime() > before.getTime()) {
    throw JobError.invalidFilter("datetime", value, "start is after end")
  }

  return { kind: "range", after, before }
}

function parseStatuses(value: string): JobStatus[] {
  const wanted = new Set<JobStatus>()

  for (const token of splitList(value.toLowerCase())) {
    const expanded = Object.hasOwn(statusFilterCategories, token)
      ? (statusFilterCategories[token] ?? [])
      : [resolveJobStatus(token)]

    for (const status of expanded) {
      if (!status) throw JobError.invalidFilter("status", token, "unknown status or category")
      wanted.add(status)
    }
  }

  return jobStatuses.filter((status) => wanted.has(status))
}

function parseTags(value: string): string[] {
  const tags = [...new Set(splitList(value))]

  for (const tag of tags) {
    if (pick(jobAccessValues, tag.toLowerCase())) {
      throw JobError.invalidFilter("tags", tag, "use the access parameter for visibility")
    }
  }

  return tags
}

function parseAccess(value: string): JobAccess {
  const access = pick(jobAccessValues, value.trim().toLowerCase())
  if (!access) throw JobError.invalidFilter("access", value, "expected public or private")

  return access
}

function parseJobType(value: string): JobType {
  switch (value.trim().toLowerCase()) {
    case "process":
      return "process"
    case "provider":
    case "service":
      return "provider"
    default:
      throw JobError.invalidFilter("type", value, "expected process or provider")
  }
}

function parseGroups(value: string): JobGroupField[] {
  const fields: JobGroupField[] = []

  for (const token of splitList(value.toLowerCase())) {
    const field = pick(jobGroupFields, token)
    if (!field) throw JobError.invalidFilter("groups", token, `expected any of ${jobGroupFields.join(", ")}`)
    if (!fields.includes(field)) fields.push(field)
  }

  return fields
}

function parseSort(value: string | undefined): JobSortKey {
  if (value === undefined) return "created"

  const key = pick(jobSortKeys, value.trim().toLowerCase())
  if (!key) throw JobError.invalidFilter("sort", value, `expected one of ${jobSortKeys.join(", ")}`)

  return key
}

function scopedValue(
  field: string,
  pathValue: string | undefined,
  queryValue: string | undefined,
): string | undefined {
  if (pathValue === undefined) return queryValue
  if (queryValue !== undefined && queryValue !== pathValue) {
    throw JobError.scopeMismatch(field, pathValue, queryValue)
  }

  return pathValue
}

function scopeProcess(scope: JobListScope): string | undefined {
  return scope.kind === "process" || scope.kind === "provider-process" ? scope.processId : undefined
}

function scopeProvider(scope: JobListScope): string | undefined {
  return scope.kind === "provider" || scope.kind === "provider-process" ? scope.providerId : undefined
}

/**
 * Compiles listing parameters into a query spec. Path scope wins over the
 * query string, which may only repeat it.
 */
export function buildJobQuerySpec(
  params: JobListParams,
  scope: JobListScope,
  identity: RequestIdentity,
  notify: NotificationTransform,
): JobQuerySpec {
  const processId = scopedValue("process", scopeProcess(scope), params.process)
  const serviceId = scopedValue("provider", scopeProvider(scope), params.provider)
  const jobType = params.type === undefined ? undefined : parseJobType(params.type)

  if (jobType === "process" && serviceId !== undefined) {
    throw JobError.invalidFilter("type", params.type, "process jobs have no provider")
  }

  const { minDuration, maxDuration } = params
  if (minDuration !== undefined && maxDuration !== undefined && minDuration > maxDuration) {
    throw JobError.invalidFilter("minDuration", minDuration, "exceeds maxDuration")
  }

  return {
    ...(processId !== undefined && { processId }),
    ...(serviceId !== undefined && { serviceId }),
    ...(jobType !== undefined && { jobType }),
    ...(params.status !== undefined && { statuses: parseStatuses(params.status) }),
    ...(params.tags !== undefined && { tags: parseTags(params.tags) }),
    ...(params.access !== undefined && { access: parseAccess(params.access) }),
    ...(params.notification !== undefined && { notificationContact: notify(params.notification) }),
    ...(minDuration !== undefined && { minDuration }),
    ...(maxDuration !== undefined && { maxDuration }),
    ...(params.datetime !== undefined && { datetime: parseDatetimeInterval(params.datetime) }),
    ...(params.groups !== undefined && { groupBy: parseGroups(params.groups) }),
    sort: parseSort(params.sort),
    page: params.page,
    limit: params.limit,
    identity,
  }
}
