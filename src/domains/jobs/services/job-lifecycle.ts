import type { Clock } from "../../../lib/clock"
import type { Logger } from "../../../lib/logger"
import type { JobDispatcher } from "../model/job-dispatcher"
import type { JobLogLevel } from "../model/job-log"
import type { JobRepository } from "../model/job-repository"
import { JobStatus } from "../model/job-status"
import { JobError } from "../model/job.errors"
import { type CreateJobParams, Job, type JobException, type JobId, type JobResult } from "../model/job.model"

export type JobLifecycleDeps = {
  repository: JobRepository
  dispatcher: JobDispatcher
  clock: Clock
  logger: Logger
}

export type JobLifecycleOptions = {
  /** Read-modify-write attempts before giving up on a contended record. */
  maxWriteAttempts: number
}

export type RunnerLogEntry = {
  message: string
  level?: JobLogLevel
}

/** A batch of runner updates applied in one write. */
export type RunnerReport = {
  status?: string
  progress?: number
  message?: string
  log?: RunnerLogEntry
  exception?: JobException
  result?: JobResult
  taskReference?: string
  contextCorrelationId?: string
}

type Mutation = (job: Job, now: Date) => boolean

export class JobLifecycleController {
  public constructor(
    private readonly deps: JobLifecycleDeps,
    private readonly opts: JobLifecycleOptions,
  ) {}

  async create(params: CreateJobParams): Promise<Job> {
    const job = Job.create(params, this.deps.clock.now())
    await this.deps.repository.insert(job.toRecord())

    this.deps.logger.info("Job created", {
      jobId: job.id,
      processId: job.processId,
      executeAsync: job.executeAsync,
    })

    return job
  }

  async get(jobId: JobId): Promise<Job> {
    const found = await this.deps.repository.getVersioned(jobId)
    if (found.kind === "not_found") throw JobError.notFound(jobId)

    return Job.fromRecord(found.record)
  }

  async applyStatus(jobId: JobId, status: string, at?: Date): Promise<Job> {
    return this.mutate(jobId, (job, now) => job.setStatus(status, at ?? now))
  }

  async applyProgress(jobId: JobId, value: number): Promise<Job> {
    return this.mutate(jobId, (job) => job.setProgress(value))
  }

  async appendLog(jobId: JobId, message: string, level: JobLogLevel, at?: Date): Promise<Job> {
    return this.mutate(jobId, (job, now) => job.appendLog(message, level, at ?? now))
  }

  async recordException(jobId: JobId, exception: JobException): Promise<Job> {
    return this.mutate(jobId, (job, now) => {
      job.recordException(exception, now)
      return true
    })
  }

  async recordResult(jobId: JobId, result: JobResult): Promise<Job> {
    return this.mutate(jobId, (job) => {
      job.recordResult(result)
      return true
    })
  }

  /**
   * Applies a runner report. Fields are applied in a fixed order so the
   * status change is logged with the reported progress.
   */
  async report(jobId: JobId, report: RunnerReport): Promise<Job> {
    return this.mutate(jobId, (job, now) => {
      let changed = false

      if (report.taskReference !== undefined) changed = job.setTaskReference(report.taskReference) || changed
      if (report.contextCorrelationId !== undefined) {
        changed = job.setContextCorrelationId(report.contextCorrelationId) || changed
      }
      if (report.progress !== undefined) changed = job.setProgress(report.progress) || changed
      if (report.message !== undefined) changed = job.setMessage(report.message) || changed

      if (report.status !== undefined) {
        const statusChanged = job.setStatus(report.status, now)
        if (statusChanged && job.status === JobStatus.SUCCEEDED && report.progress === undefined) {
          job.setProgress(100)
        }
        changed = statusChanged || changed
      }

      if (report.exception !== undefined) {
        job.recordException(report.exception, now)
        changed = true
      }
      if (report.result !== undefined) {
        job.recordResult(report.result)
        changed = true
      }
      if (report.log !== undefined) {
        changed = job.appendLog(report.log.message, report.log.level ?? "info", now) || changed
      }

      return changed
    })
  }

  /**
   * Stops a job and drops its results. A job that is still pending or
   * running is forced to `dismissed` and the runner is asked to revoke it;
   * a finished job keeps its status and its results are marked gone.
   */
  async dismiss(jobId: JobId): Promise<Job> {
    const outcome = { revoke: false }

    const job = await this.mutate(jobId, (current, now) => {
      if (current.status === JobStatus.DISMISSED) return false

      outcome.revoke = !current.isFinished
      if (!outcome.revoke) return current.dismissResults(now)

      current.setStatus(JobStatus.DISMISSED, now)
      current.setMessage("Job dismissed.")
      current.clearResults()
      return true
    })

    if (outcome.revoke) await this.revoke(job)

    return job
  }

  async delete(jobId: JobId): Promise<true> {
    const deleted = await this.deps.repository.delete(jobId)
    if (!deleted) throw JobError.notFound(jobId)

    this.deps.logger.info("Job deleted", { jobId })
    return true
  }

  private async revoke(job: Job): Promise<void> {
    try {
      await this.deps.dispatcher.revoke(job.id, job.taskReference)
    } catch (err) {
      this.deps.logger.warn("Runner did not acknowledge job revocation", { jobId: job.id, err })
    }
  }

  private async mutate(jobId: JobId, apply: Mutation): Promise<Job> {
    const { repository, clock, logger } = this.deps

    for (let attempt = 1; attempt <= this.opts.maxWriteAttempts; attempt++) {
      const found = await repository.getVersioned(jobId)
      if (found.kind === "not_found") throw JobError.notFound(jobId)

      const job = Job.fromRecord(found.record)
      const now = clock.now()

      if (!apply(job, now)) return job
      job.touch(now)

      const write = await repository.replaceIfVersion(job.toRecord(), found.version)
      if (write.kind === "written") return job
      if (write.kind === "not_found") throw JobError.notFound(jobId)

      logger.debug("Job write conflict", { jobId, attempt })
    }

    throw JobError.writeConflict(jobId, this.opts.maxWriteAttempts)
  }
}
