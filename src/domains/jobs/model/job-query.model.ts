import type { RequestIdentity } from "./identity.model"
import type { Job, JobAccess } from "./job.model"
import type { JobStatus } from "./job-status"

export type JobType = "process" | "provider"

export const jobSortKeys = ["created", "finished", "id", "user", "status", "process", "service"] as const
export type JobSortKey = (typeof jobSortKeys)[number]

export const jobGroupFields = ["process", "provider", "service", "status"] as const
export type JobGroupField = (typeof jobGroupFields)[number]

export type DatetimeInterval =
  | { kind: "before"; before: Date }
  | { kind: "after"; after: Date }
  | { kind: "range"; after: Date; before: Date }
  | { kind: "match"; at: Date }

export type JobQuerySpec = {
  processId?: string
  serviceId?: string
  jobType?: JobType
  /** Already expanded from categories. */
  statuses?: JobStatus[]
  tags?: string[]
  access?: JobAccess
  /** Transformed the same way as the stored contact. */
  notificationContact?: string
  minDuration?: number
  maxDuration?: number
  datetime?: DatetimeInterval
  groupBy?: JobGroupField[]
  sort: JobSortKey
  page: number
  limit: number
  identity: RequestIdentity
}

export type JobGroup = {
  /** Keyed by the field names as requested. */
  category: Partial<Record<JobGroupField, string | null>>
  jobs: Job[]
  count: number
}

export type JobQueryResult =
  | { kind: "paged"; jobs: Job[]; total: number; page: number; limit: number }
  | { kind: "grouped"; groups: JobGroup[]; total: number }

/** Where a listing was requested from; drives scoping and links. */
export type JobListScope =
  | { kind: "global" }
  | { kind: "process"; processId: string }
  | { kind: "provider"; providerId: string }
  | { kind: "provider-process"; providerId: string; processId: string }
