import type { AppConfig } from "../../../app/config"
import { parseOrThrow } from "../../../lib/errors"
import type { Context, RequestHandler } from "../../../lib/server"
import type { JobServices } from "../composition"
import { assertCanModifyJob } from "../services/job-access"
import { dismissJobsRequestSchema } from "./job.api.schema"
import { type JobStatusBody, presentJob } from "./job.presenter"
import { apiBaseUrl, jobIdParam, pathScope, readJsonBody, toJobId } from "./request-context"

export function dismissJobHandler({ listing, lifecycle, clock }: JobServices, config: AppConfig): RequestHandler {
  return async (c: Context) => {
    const identity = c.get("identity")
    const job = await listing.getVisibleJob(jobIdParam(c), identity, pathScope(c))
    assertCanModifyJob(identity, job)

    const dismissed = await lifecycle.dismiss(job.id)

    return c.json<JobStatusBody>(presentJob(dismissed, clock.now(), apiBaseUrl(c, config)))
  }
}

/** Every id is checked before any job is dismissed. */
export function dismissJobsHandler({ listing, lifecycle }: JobServices): RequestHandler {
  return async (c: Context) => {
    const identity = c.get("identity")
    const body = parseOrThrow(dismissJobsRequestSchema, await readJsonBody(c))

    const ids = [...new Set(body.jobs.map(toJobId))]
    const jobs = await Promise.all(ids.map((id) => listing.getVisibleJob(id, identity)))
    for (const job of jobs) assertCanModifyJob(identity, job)

    for (const job of jobs) await lifecycle.dismiss(job.id)

    return c.json<{ jobs: string[] }>({ jobs: ids })
  }
}
