import type { AppConfig } from "../../../app/config"
import { parseOrThrow } from "../../../lib/errors"
import type { Context, RequestHandler } from "../../../lib/server"
import type { JobServices } from "../composition"
import { JobStatus } from "../model/job-status"
import type { ExecutionOutcome } from "../services/job-execution"
import { type ExecuteRequest, executeRequestSchema } from "./job.api.schema"
import { type JobResultBody, type JobStatusBody, presentJob, presentResults } from "./job.presenter"
import { apiBaseUrl, pathScope, processIdParam, readJsonBody } from "./request-context"

export type ExecutionResponseBody = JobStatusBody & {
  results?: Record<string, JobResultBody>
}

/**
 * Submits a process execution. A sync execution that completes in time
 * answers 200 with the final status; anything else answers 201 with the
 * job location.
 */
export function executeProcessHandler({ execution, clock }: JobServices, config: AppConfig): RequestHandler {
  return async (c: Context) => {
    const body: ExecuteRequest = parseOrThrow(executeRequestSchema, await readJsonBody(c))
    const { providerId } = pathScope(c)
    const acceptLanguage = c.req.header("accept-language")
    const correlationId = c.req.header("x-correlation-id")

    const outcome = await execution.submit({
      processId: processIdParam(c),
      identity: c.get("identity"),
      prefer: c.req.header("prefer"),
      inputs: body.inputs,
      signal: c.req.raw.signal,
      ...(providerId !== undefined && { providerId }),
      ...(body.outputs !== undefined && { outputs: body.outputs }),
      ...(body.access !== undefined && { access: body.access }),
      ...(body.tags !== undefined && { tags: body.tags }),
      ...(body.notification_email !== undefined && { notificationEmail: body.notification_email }),
      ...(acceptLanguage !== undefined && { acceptLanguage }),
      ...(correlationId !== undefined && { contextCorrelationId: correlationId }),
    })

    const baseUrl = apiBaseUrl(c, config)
    for (const [name, value] of Object.entries(outcome.decision.appliedPreferenceHeader)) {
      c.header(name, value)
    }

    return respond(c, outcome, clock.now(), baseUrl)
  }
}

function respond(c: Context, outcome: ExecutionOutcome, now: Date, baseUrl: string) {
  const { job } = outcome
  const status = presentJob(job, now, baseUrl)

  if (outcome.kind === "completed") {
    return c.json<ExecutionResponseBody>({
      ...status,
      ...(job.status === JobStatus.SUCCEEDED && { results: presentResults(job) }),
    })
  }

  c.header("Location", `${baseUrl}/jobs/${job.id}`)
  return c.json<ExecutionResponseBody>(status, 201)
}
