import { v4 as uuidv4 } from "uuid"
import type { Clock, Milliseconds } from "../../../lib/clock"
import type { Logger } from "../../../lib/logger"
import type { ExecutionModeDecision } from "../model/execution-mode.model"
import { type RequestIdentity, userIdOf } from "../model/identity.model"
import type { JobDispatcher } from "../model/job-dispatcher"
import { JobStatus } from "../model/job-status"
import type { Job } from "../model/job.model"
import type { ProcessCatalog } from "../model/process.model"
import { negotiateExecutionMode } from "./execution-mode-negotiator"
import { resolveProcess } from "./job-access"
import type { JobLifecycleController } from "./job-lifecycle"
import type { NotificationTransform } from "./notification-transform"
import { parsePreferHeader } from "./prefer-header"
import { waitForJobCompletion } from "./sync-waiter"

export type JobExecutionDeps = {
  catalog: ProcessCatalog
  lifecycle: JobLifecycleController
  dispatcher: JobDispatcher
  notify: NotificationTransform
  clock: Clock
  logger: Logger
}

export type JobExecutionOptions = {
  maxSyncWaitSeconds: number
  pollIntervalMs: Milliseconds
}

export type ExecutionRequest = {
  processId: string
  providerId?: string
  identity: RequestIdentity
  /** Raw `Prefer` header value(s). */
  prefer: string | readonly string[] | undefined
  inputs: Record<string, unknown>
  outputs?: Record<string, unknown>
  access?: string
  notificationEmail?: string
  tags?: readonly string[]
  acceptLanguage?: string
  contextCorrelationId?: string
  /** Aborts the inline wait of a sync execution. */
  signal?: AbortSignal
}

export type ExecutionOutcome =
  | { kind: "completed"; job: Job; decision: ExecutionModeDecision }
  | { kind: "accepted"; job: Job; decision: ExecutionModeDecision }

const asyncFallback = (): ExecutionModeDecision => ({ mode: "async", waitSeconds: null, appliedPreferenceHeader: {} })

export class JobExecutionService {
  public constructor(
    private readonly deps: JobExecutionDeps,
    private readonly opts: JobExecutionOptions,
  ) {}

  /**
   * Creates a job for the process and hands it to the runner. Sync
   * executions wait inline and fall back to an async answer on timeout.
   */
  async submit(request: ExecutionRequest): Promise<ExecutionOutcome> {
    const { catalog, lifecycle, notify } = this.deps

    const preference = parsePreferHeader(request.prefer)
    const process = await resolveProcess(catalog, request.identity, request.processId, request.providerId)
    const decision = negotiateExecutionMode(process.jobControlOptions, preference, this.opts.maxSyncWaitSeconds)

    const userId = userIdOf(request.identity)
    const job = await lifecycle.create({
      taskReference: uuidv4(),
      processId: process.id,
      isWorkflow: process.isWorkflow,
      inputs: request.inputs,
      executeAsync: decision.mode === "async",
      ...(request.providerId !== undefined && { serviceId: request.providerId }),
      ...(request.outputs !== undefined && { outputs: request.outputs }),
      ...(userId !== undefined && { userId }),
      ...(request.access !== undefined && { access: request.access }),
      ...(request.tags !== undefined && { tags: request.tags }),
      ...(request.notificationEmail !== undefined && {
        notificationContact: notify(request.notificationEmail),
      }),
      ...(request.acceptLanguage !== undefined && { acceptLanguage: request.acceptLanguage }),
      ...(request.contextCorrelationId !== undefined && {
        contextCorrelationId: request.contextCorrelationId,
      }),
    })

    await this.dispatch(job)

    if (decision.mode === "async" || decision.waitSeconds === null) {
      return { kind: "accepted", job, decision }
    }

    return this.awaitResult(job, decision, decision.waitSeconds, request.signal)
  }

  private async dispatch(job: Job): Promise<void> {
    try {
      await this.deps.dispatcher.dispatch({
        jobId: job.id,
        taskReference: job.taskReference,
        processId: job.processId,
        serviceId: job.serviceId,
        inputs: job.inputs,
        outputs: job.outputs,
        executeAsync: job.executeAsync,
      })
    } catch (err) {
      this.deps.logger.error("Job dispatch failed", { jobId: job.id, err })
      await this.deps.lifecycle.report(job.id, {
        status: JobStatus.FAILED,
        exception: { code: "dispatch_failed", message: "Job could not be handed to the runner" },
      })
      throw err
    }
  }

  private async awaitResult(
    job: Job,
    decision: ExecutionModeDecision,
    waitSeconds: number,
    signal?: AbortSignal,
  ): Promise<ExecutionOutcome> {
    const { clock, lifecycle, logger } = this.deps

    const outcome = await waitForJobCompletion(clock, () => lifecycle.get(job.id), {
      timeoutSeconds: waitSeconds,
      pollIntervalMs: this.opts.pollIntervalMs,
      ...(signal !== undefined && { signal }),
    })

    switch (outcome.kind) {
      case "finished":
        return { kind: "completed", job: outcome.job, decision }

      case "aborted":
        return { kind: "accepted", job: outcome.job, decision: asyncFallback() }

      case "timed_out": {
        const message =
          `Job requested as synchronous execution took too long to complete (wait=${waitSeconds}s). ` +
          "Will resume with asynchronous execution."

        logger.warn(message, { jobId: job.id })
        const updated = await lifecycle.appendLog(job.id, message, "warning")

        return { kind: "accepted", job: updated, decision: asyncFallback() }
      }
    }
  }
}
