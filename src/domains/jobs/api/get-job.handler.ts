import type { AppConfig } from "../../../app/config"
import type { Context, RequestHandler } from "../../../lib/server"
import type { JobServices } from "../composition"
import { type JobStatusBody, presentJob } from "./job.presenter"
import { apiBaseUrl, jobIdParam, pathScope } from "./request-context"

export function getJobHandler({ listing, clock }: JobServices, config: AppConfig): RequestHandler {
  return async (c: Context) => {
    const job = await listing.getVisibleJob(jobIdParam(c), c.get("identity"), pathScope(c))

    return c.json<JobStatusBody>(presentJob(job, clock.now(), apiBaseUrl(c, config)))
  }
}
