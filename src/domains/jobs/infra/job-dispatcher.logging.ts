import type { Logger } from "../../../lib/logger"
import type { JobDispatchRequest, JobDispatcher } from "../model/job-dispatcher"
import type { JobId } from "../model/job.model"

export type LoggingJobDispatcherDeps = {
  logger: Logger
}

/**
 * Default dispatcher for deployments whose runner polls on its own. It
 * records each hand-off and nothing else.
 */
export class LoggingJobDispatcher implements JobDispatcher {
  public constructor(private readonly deps: LoggingJobDispatcherDeps) {}

  async dispatch(request: JobDispatchRequest): Promise<void> {
    this.deps.logger.info("Job handed to runner", {
      jobId: request.jobId,
      taskReference: request.taskReference,
      processId: request.processId,
      executeAsync: request.executeAsync,
      ...(request.serviceId !== null && { providerId: request.serviceId }),
    })
  }

  async revoke(jobId: JobId, taskReference: string): Promise<void> {
    this.deps.logger.info("Job revocation requested", { jobId, taskReference })
  }
}
