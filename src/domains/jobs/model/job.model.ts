import { uuidIdType } from "../../../lib/id"
import { JobError } from "./job.errors"
import { formatDuration, formatJobLogLine, type JobLogLevel } from "./job-log"
import {
  allowedTransitions,
  isTerminalStatus,
  JobStatus,
  type JobStatusCategory,
  resolveJobStatus,
  statusCategory,
} from "./job-status"

export const JobId = uuidIdType("JobId")
export type JobId = ReturnType<typeof JobId.generate>

export const jobAccessValues = ["public", "private"] as const
export type JobAccess = (typeof jobAccessValues)[number]

export const DEFAULT_JOB_MESSAGE = "no message"

export type JobException = {
  code: string
  message: string
  locator?: string
}

export type JobResult = {
  id: string
  href?: string
  mediaType?: string
  value?: unknown
}

/** Persisted shape of a job. Only `Job` writes it. */
export type JobRecord = {
  id: JobId
  taskReference: string
  processId: string
  serviceId: string | null
  isWorkflow: boolean
  status: JobStatus
  progress: number
  message: string
  created: Date
  started: Date | null
  finished: Date | null
  updated: Date
  userId: string | null
  access: JobAccess
  logs: string[]
  exceptions: JobException[]
  results: JobResult[]
  /** Set once a finished job's results were dismissed. */
  resultsDismissed: boolean
  tags: string[]
  notificationContact: string | null
  acceptLanguage: string | null
  executeAsync: boolean
  contextCorrelationId: string | null
  inputs: Record<string, unknown>
  outputs: Record<string, unknown>
}

export type CreateJobParams = {
  taskReference: unknown
  processId: string
  serviceId?: string
  isWorkflow?: boolean
  inputs: Record<string, unknown>
  outputs?: Record<string, unknown>
  userId?: string
  access?: string
  executeAsync: boolean
  created?: Date
  tags?: readonly string[]
  notificationContact?: string
  acceptLanguage?: string
  contextCorrelationId?: string
}

function isToken(value: unknown): value is string {
  return typeof value === "string" && /^\S+$/.test(value)
}

function parseAccess(value: string): JobAccess {
  const access = jobAccessValues.find((candidate) => candidate === value)
  if (!access) throw JobError.invalidField("access", value, "expected one of public, private")
  return access
}

function buildTags(isWorkflow: boolean, executeAsync: boolean, custom: readonly string[]): string[] {
  const tags = [isWorkflow ? "workflow" : "application", executeAsync ? "async" : "sync"]

  for (const raw of custom) {
    const tag = raw.trim()
    if (tag && !tags.includes(tag)) tags.push(tag)
  }

  return tags
}

/**
 * A process invocation and its evolving state. Every setter validates
 * its input and leaves the job untouched when it throws.
 */
export class Job {
  private constructor(private readonly record: JobRecord) {}

  static create(params: CreateJobParams, now: Date): Job {
    if (!isToken(params.taskReference)) {
      throw JobError.invalidField("taskReference", params.taskReference, "expected a non-empty token")
    }

    const isWorkflow = params.isWorkflow ?? false
    const created = params.created ?? now

    const job = new Job({
      id: JobId.generate(),
      taskReference: params.taskReference,
      processId: params.processId,
      serviceId: params.serviceId ?? null,
      isWorkflow,
      status: JobStatus.ACCEPTED,
      progress: 0,
      message: DEFAULT_JOB_MESSAGE,
      created,
      started: null,
      finished: null,
      updated: created,
      userId: params.userId ?? null,
      access: params.access === undefined ? "private" : parseAccess(params.access),
      logs: [],
      exceptions: [],
      results: [],
      resultsDismissed: false,
      tags: buildTags(isWorkflow, params.executeAsync, params.tags ?? []),
      notificationContact: params.notificationContact ?? null,
      acceptLanguage: params.acceptLanguage ?? null,
      executeAsync: params.executeAsync,
      contextCorrelationId: params.contextCorrelationId ?? null,
      inputs: structuredClone(params.inputs),
      outputs: structuredClone(params.outputs ?? {}),
    })

    job.setMessage("Job accepted for execution.")
    job.appendLog(job.message, "info", created)

    return job
  }

  static fromRecord(record: JobRecord): Job {
    return new Job(structuredClone(record))
  }

  toRecord(): JobRecord {
    return structuredClone(this.record)
  }

  get id(): JobId {
    return this.record.id
  }

  get taskReference(): string {
    return this.record.taskReference
  }

  get processId(): string {
    return this.record.processId
  }

  get serviceId(): string | null {
    return this.record.serviceId
  }

  get isWorkflow(): boolean {
    return this.record.isWorkflow
  }

  get status(): JobStatus {
    return this.record.status
  }

  get statusCategory(): JobStatusCategory {
    return statusCategory(this.record.status)
  }

  get isFinished(): boolean {
    return isTerminalStatus(this.record.status)
  }

  get progress(): number {
    return this.record.progress
  }

  get message(): string {
    return this.record.message
  }

  get created(): Date {
    return this.record.created
  }

  get started(): Date | null {
    return this.record.started
  }

  get finished(): Date | null {
    return this.record.finished
  }

  get updated(): Date {
    return this.record.updated
  }

  get userId(): string | null {
    return this.record.userId
  }

  get access(): JobAccess {
    return this.record.access
  }

  get logs(): readonly string[] {
    return this.record.logs
  }

  get exceptions(): readonly JobException[] {
    return this.record.exceptions
  }

  get results(): readonly JobResult[] {
    return this.record.results
  }

  get resultsDismissed(): boolean {
    return this.record.resultsDismissed
  }

  get tags(): readonly string[] {
    return this.record.tags
  }

  get notificationContact(): string | null {
    return this.record.notificationContact
  }

  get acceptLanguage(): string | null {
    return this.record.acceptLanguage
  }

  get executeAsync(): boolean {
    return this.record.executeAsync
  }

  get contextCorrelationId(): string | null {
    return this.record.contextCorrelationId
  }

  get inputs(): Readonly<Record<string, unknown>> {
    return this.record.inputs
  }

  get outputs(): Readonly<Record<string, unknown>> {
    return this.record.outputs
  }

  /** Whole seconds between `started` and `finished` (or `now`); 0 when never started. */
  durationSeconds(now: Date): number {
    const { started, finished } = this.record
    if (!started) return 0

    return Math.max(0, Math.floor(((finished ?? now).getTime() - started.getTime()) / 1000))
  }

  duration(now: Date): string {
    return formatDuration(this.durationSeconds(now))
  }

  /**
   * Moves the job forward through its state machine. Returns false when
   * the job already has `status`.
   */
  setStatus(status: JobStatus | string, at: Date): boolean {
    const next = resolveJobStatus(status)
    if (!next) throw JobError.invalidField("status", status, "unknown status")

    const current = this.record.status
    if (next === current) return false

    if (!allowedTransitions(current).includes(next)) {
      throw JobError.invalidTransition(this.record.id, current, next)
    }

    this.record.status = next
    if (next === JobStatus.RUNNING && !this.record.started) this.record.started = at
    if (isTerminalStatus(next) && !this.record.finished) this.record.finished = at

    this.appendLog(`Job status changed to ${next}.`, "info", at)
    return true
  }

  setProgress(value: number): boolean {
    if (!Number.isFinite(value) || value < 0 || value > 100) {
      throw JobError.invalidField("progress", value, "expected a number between 0 and 100")
    }
    if (value === this.record.progress) return false

    this.record.progress = value
    return true
  }

  setMessage(message: string): boolean {
    const next = message.trim() || DEFAULT_JOB_MESSAGE
    if (next === this.record.message) return false

    this.record.message = next
    return true
  }

  setAccess(access: string): boolean {
    const next = parseAccess(access)
    if (next === this.record.access) return false

    this.record.access = next
    return true
  }

  /** Attaches the runner's correlation id. It cannot change once set. */
  setTaskReference(reference: string): boolean {
    if (reference === this.record.taskReference) return false
    throw JobError.invalidField("taskReference", reference, "task reference is immutable")
  }

  setContextCorrelationId(id: string): boolean {
    if (id === this.record.contextCorrelationId) return false

    this.record.contextCorrelationId = id
    return true
  }

  /** Appends a formatted line unless it repeats the previous entry. */
  appendLog(message: string, level: JobLogLevel, at: Date): boolean {
    const line = formatJobLogLine({
      at,
      level,
      duration: this.duration(at),
      progress: this.record.progress,
      status: this.record.status,
      message,
    })

    if (this.record.logs.at(-1) === line) return false

    this.record.logs.push(line)
    return true
  }

  recordException(exception: JobException, at: Date): void {
    this.record.exceptions.push({ ...exception })
    const locator = exception.locator ? ` - locator=${exception.locator}` : ""
    this.appendLog(`${exception.message} - code=${exception.code}${locator}`, "error", at)
  }

  recordResult(result: JobResult): void {
    this.record.results.push({ ...result })
  }

  clearResults(): boolean {
    if (this.record.results.length === 0) return false

    this.record.results = []
    return true
  }

  /** Drops the results of a finished job and marks them gone. */
  dismissResults(at: Date): boolean {
    if (this.record.resultsDismissed) return false

    this.record.resultsDismissed = true
    this.record.results = []
    this.appendLog("Job results dismissed.", "info", at)
    return true
  }

  touch(at: Date): void {
    this.record.updated = at
  }
}
