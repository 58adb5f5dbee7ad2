import { timingSafeEqual } from "node:crypto"
import type { AppConfig } from "../../../app/config"
import { parseOrThrow } from "../../../lib/errors"
import type { Context, RequestHandler } from "../../../lib/server"
import type { JobServices } from "../composition"
import { JobError } from "../model/job.errors"
import type { RunnerReport } from "../services/job-lifecycle"
import { runnerReportSchema, type RunnerReportRequest } from "./job.api.schema"
import { type JobStatusBody, presentJob } from "./job.presenter"
import { apiBaseUrl, jobIdParam, readJsonBody } from "./request-context"

export const RUNNER_TOKEN_HEADER = "x-runner-token"

/** Without a configured token every report is refused. */
function assertRunnerToken(expected: string | undefined, presented: string | undefined): void {
  if (expected === undefined || presented === undefined) throw JobError.runnerUnauthorized()

  const a = Buffer.from(expected)
  const b = Buffer.from(presented)
  if (a.length !== b.length || !timingSafeEqual(a, b)) throw JobError.runnerUnauthorized()
}

function toRunnerReport(body: RunnerReportRequest): RunnerReport {
  const { log, exception, result } = body

  return {
    ...(body.status !== undefined && { status: body.status }),
    ...(body.progress !== undefined && { progress: body.progress }),
    ...(body.message !== undefined && { message: body.message }),
    ...(body.taskReference !== undefined && { taskReference: body.taskReference }),
    ...(body.contextCorrelationId !== undefined && { contextCorrelationId: body.contextCorrelationId }),
    ...(log !== undefined && {
      log: { message: log.message, ...(log.level !== undefined && { level: log.level }) },
    }),
    ...(exception !== undefined && {
      exception: {
        code: exception.code,
        message: exception.message,
        ...(exception.locator !== undefined && { locator: exception.locator }),
      },
    }),
    ...(result !== undefined && {
      result: {
        id: result.id,
        ...(result.href !== undefined && { href: result.href }),
        ...(result.mediaType !== undefined && { mediaType: result.mediaType }),
        ...(result.value !== undefined && { value: result.value }),
      },
    }),
  }
}

export function reportJobHandler({ lifecycle, clock }: JobServices, config: AppConfig): RequestHandler {
  return async (c: Context) => {
    assertRunnerToken(config.jobs.runnerToken, c.req.header(RUNNER_TOKEN_HEADER))

    const jobId = jobIdParam(c)
    const body = parseOrThrow(runnerReportSchema, await readJsonBody(c))

    const job = await lifecycle.report(jobId, toRunnerReport(body))

    return c.json<JobStatusBody>(presentJob(job, clock.now(), apiBaseUrl(c, config)))
  }
}
