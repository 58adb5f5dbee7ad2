import type { TimeSource } from "../../../lib/clock"
import { isAdmin, type RequestIdentity } from "../model/identity.model"
import { Job, type JobAccess } from "../model/job.model"
import type {
  DatetimeInterval,
  JobGroup,
  JobGroupField,
  JobQueryResult,
  JobQuerySpec,
  JobSortKey,
} from "../model/job-query.model"
import type { JobRepository } from "../model/job-repository"

export type JobQueryEngineDeps = {
  repository: JobRepository
  clock: TimeSource
}

type Predicate = (job: Job) => boolean

const DESCENDING_KEYS: ReadonlySet<JobSortKey> = new Set(["created", "finished"])

function visibilityPredicate(identity: RequestIdentity, access: JobAccess | undefined): Predicate {
  if (identity.kind === "anonymous") return (job) => job.access === "public"

  const matchesAccess = (job: Job) => access === undefined || job.access === access
  if (isAdmin(identity)) return matchesAccess

  return (job) => job.userId === identity.userId && matchesAccess(job)
}

function datetimePredicate(interval: DatetimeInterval): Predicate {
  switch (interval.kind) {
    case "before":
      return (job) => job.created.getTime() <= interval.before.getTime()
    case "after":
      return (job) => job.created.getTime() >= interval.after.getTime()
    case "range":
      return (job) =>
        job.created.getTime() >= interval.after.getTime() && job.created.getTime() <= interval.before.getTime()
    case "match":
      return (job) => job.created.getTime() === interval.at.getTime()
  }
}

function compilePredicates(spec: JobQuerySpec, now: Date): Predicate[] {
  const predicates: Predicate[] = [visibilityPredicate(spec.identity, spec.access)]

  const { processId, serviceId, jobType, statuses, tags, notificationContact, minDuration, maxDuration } = spec

  if (processId !== undefined) predicates.push((job) => job.processId === processId)
  if (serviceId !== undefined) predicates.push((job) => job.serviceId === serviceId)
  if (jobType === "process") predicates.push((job) => job.serviceId === null)
  if (jobType === "provider") predicates.push((job) => job.serviceId !== null)
  if (statuses !== undefined) predicates.push((job) => statuses.includes(job.status))
  if (tags !== undefined) predicates.push((job) => tags.every((tag) => job.tags.includes(tag)))
  if (notificationContact !== undefined) {
    predicates.push((job) => job.notificationContact === notificationContact)
  }

  if (minDuration !== undefined || maxDuration !== undefined) {
    predicates.push((job) => {
      if (!job.started) return false

      const seconds = job.durationSeconds(now)
      return (minDuration === undefined || seconds >= minDuration) && (maxDuration === undefined || seconds <= maxDuration)
    })
  }

  if (spec.datetime !== undefined) predicates.push(datetimePredicate(spec.datetime))

  return predicates
}

function sortValue(job: Job, key: JobSortKey): string | number | null {
  switch (key) {
    case "created":
      return job.created.getTime()
    case "finished":
      return job.finished?.getTime() ?? null
    case "id":
      return job.id
    case "user":
      return job.userId
    case "status":
      return job.status
    case "process":
      return job.processId
    case "service":
      return job.serviceId
  }
}

function compareValues(a: string | number, b: string | number): number {
  if (typeof a === "number" && typeof b === "number") return a - b

  const left = String(a)
  const right = String(b)
  if (left < right) return -1
  if (left > right) return 1
  return 0
}

/** Missing values sort last in either direction; ties fall back to id. */
function comparator(key: JobSortKey): (a: Job, b: Job) => number {
  const direction = DESCENDING_KEYS.has(key) ? -1 : 1

  return (a, b) => {
    const left = sortValue(a, key)
    const right = sortValue(b, key)

    if (left !== right) {
      if (left === null) return 1
      if (right === null) return -1

      const order = compareValues(left, right) * direction
      if (order !== 0) return order
    }

    return compareValues(a.id, b.id)
  }
}

function groupValue(job: Job, field: JobGroupField): string | null {
  switch (field) {
    case "process":
      return job.processId
    case "provider":
    case "service":
      return job.serviceId
    case "status":
      return job.status
  }
}

function groupJobs(jobs: readonly Job[], fields: readonly JobGroupField[]): JobGroup[] {
  const groups = new Map<string, JobGroup>()

  for (const job of jobs) {
    const category: JobGroup["category"] = {}
    for (const field of fields) category[field] = groupValue(job, field)

    const key = JSON.stringify(fields.map((field) => category[field]))
    const group = groups.get(key)

    if (group) {
      group.jobs.push(job)
      group.count++
    } else {
      groups.set(key, { category, jobs: [job], count: 1 })
    }
  }

  return [...groups.values()]
}

/**
 * Evaluates job listings over a snapshot of the repository. Visibility is
 * applied before every other filter so `total` never counts hidden jobs.
 */
export class JobQueryEngine {
  public constructor(private readonly deps: JobQueryEngineDeps) {}

  async query(spec: JobQuerySpec): Promise<JobQueryResult> {
    const now = this.deps.clock.now()
    const predicates = compilePredicates(spec, now)

    const records = await this.deps.repository.list()
    const matched = records
      .map((record) => Job.fromRecord(record))
      .filter((job) => predicates.every((predicate) => predicate(job)))
      .sort(comparator(spec.sort))

    const total = matched.length

    if (spec.groupBy !== undefined && spec.groupBy.length > 0) {
      return { kind: "grouped", groups: groupJobs(matched, spec.groupBy), total }
    }

    const start = spec.page * spec.limit
    return {
      kind: "paged",
      jobs: matched.slice(start, start + spec.limit),
      total,
      page: spec.page,
      limit: spec.limit,
    }
  }
}
