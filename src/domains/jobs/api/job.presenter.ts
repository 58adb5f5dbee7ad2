import type { Job } from "../model/job.model"
import type { JobGroup, JobQueryResult } from "../model/job-query.model"
import { buildJobLinks, type JobLink } from "../services/job-links"

export type JobStatusBody = {
  jobID: string
  processID: string
  providerID?: string
  type: "process"
  status: string
  message: string
  created: string
  started?: string
  finished?: string
  updated: string
  duration: string
  runningSeconds: number
  percentCompleted: number
  progress: number
  links: JobLink[]
}

export type JobResultBody = {
  href?: string
  mediaType?: string
  value?: unknown
}

type ListedJob = string | JobStatusBody

type JobGroupBody = {
  category: JobGroup["category"]
  jobs: ListedJob[]
  count: number
}

export type JobListingBody =
  | { jobs: ListedJob[]; page: number; limit: number; total: number; count: number; links: JobLink[] }
  | { groups: JobGroupBody[]; total: number; count: number; links: JobLink[] }

export function presentJob(job: Job, now: Date, baseUrl: string): JobStatusBody {
  return {
    jobID: job.id,
    processID: job.processId,
    ...(job.serviceId !== null && { providerID: job.serviceId }),
    type: "process",
    status: job.status,
    message: job.message,
    created: job.created.toISOString(),
    ...(job.started && { started: job.started.toISOString() }),
    ...(job.finished && { finished: job.finished.toISOString() }),
    updated: job.updated.toISOString(),
    duration: job.duration(now),
    runningSeconds: job.durationSeconds(now),
    percentCompleted: job.progress,
    progress: job.progress,
    links: buildJobLinks(baseUrl, job),
  }
}

/** Results keyed by output id. */
export function presentResults(job: Job): Record<string, JobResultBody> {
  const body: Record<string, JobResultBody> = {}

  for (const result of job.results) {
    body[result.id] = {
      ...(result.href !== undefined && { href: result.href }),
      ...(result.mediaType !== undefined && { mediaType: result.mediaType }),
      ...(result.value !== undefined && { value: result.value }),
    }
  }

  return body
}

export type ListingPresentation = {
  detail: boolean
  now: Date
  baseUrl: string
  links: JobLink[]
}

export function presentListing(result: JobQueryResult, opts: ListingPresentation): JobListingBody {
  const list = (jobs: readonly Job[]): ListedJob[] =>
    jobs.map((job) => (opts.detail ? presentJob(job, opts.now, opts.baseUrl) : job.id))

  if (result.kind === "grouped") {
    return {
      groups: result.groups.map((group) => ({
        category: group.category,
        jobs: list(group.jobs),
        count: group.count,
      })),
      total: result.total,
      count: result.groups.length,
      links: opts.links,
    }
  }

  return {
    jobs: list(result.jobs),
    page: result.page,
    limit: result.limit,
    total: result.total,
    count: result.jobs.length,
    links: opts.links,
  }
}
