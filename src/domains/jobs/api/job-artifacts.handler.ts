import type { AppConfig } from "../../../app/config"
import type { Context, RequestHandler } from "../../../lib/server"
import type { JobServices } from "../composition"
import { JobStatus } from "../model/job-status"
import { JobError } from "../model/job.errors"
import type { Job, JobException } from "../model/job.model"
import { buildJobLinks, type JobLink } from "../services/job-links"
import { type JobResultBody, presentResults } from "./job.presenter"
import { apiBaseUrl, jobIdParam, pathScope } from "./request-context"

export type JobOutputsBody = {
  outputs: Record<string, JobResultBody>
  links: JobLink[]
}

function assertResultsAvailable(job: Job): void {
  if (job.resultsDismissed) throw JobError.gone(job.id)

  switch (job.status) {
    case JobStatus.SUCCEEDED:
      return
    case JobStatus.DISMISSED:
      throw JobError.gone(job.id)
    case JobStatus.FAILED:
      throw JobError.resultsFailed(job.id)
    default:
      throw JobError.resultsNotReady(job.id, job.status)
  }
}

function loadJob({ listing }: JobServices, c: Context): Promise<Job> {
  return listing.getVisibleJob(jobIdParam(c), c.get("identity"), pathScope(c))
}

export function jobLogsHandler(jobs: JobServices): RequestHandler {
  return async (c: Context) => {
    const job = await loadJob(jobs, c)
    return c.json<readonly string[]>(job.logs)
  }
}

export function jobExceptionsHandler(jobs: JobServices): RequestHandler {
  return async (c: Context) => {
    const job = await loadJob(jobs, c)
    return c.json<readonly JobException[]>(job.exceptions)
  }
}

export function jobResultsHandler(jobs: JobServices): RequestHandler {
  return async (c: Context) => {
    const job = await loadJob(jobs, c)
    assertResultsAvailable(job)

    return c.json<Record<string, JobResultBody>>(presentResults(job))
  }
}

export function jobOutputsHandler(jobs: JobServices, config: AppConfig): RequestHandler {
  return async (c: Context) => {
    const job = await loadJob(jobs, c)
    assertResultsAvailable(job)

    return c.json<JobOutputsBody>({
      outputs: presentResults(job),
      links: buildJobLinks(apiBaseUrl(c, config), job),
    })
  }
}
