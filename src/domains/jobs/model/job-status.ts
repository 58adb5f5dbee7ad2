export const JobStatus = {
  ACCEPTED: "accepted",
  RUNNING: "running",
  SUCCEEDED: "succeeded",
  FAILED: "failed",
  DISMISSED: "dismissed",
} as const

export type JobStatus = (typeof JobStatus)[keyof typeof JobStatus]

export const jobStatuses: readonly JobStatus[] = Object.values(JobStatus)

/** Runner dialect words accepted on input only. */
const STATUS_ALIASES: Readonly<Record<string, JobStatus>> = {
  started: JobStatus.RUNNING,
  paused: JobStatus.RUNNING,
  successful: JobStatus.SUCCEEDED,
  exception: JobStatus.FAILED,
}

/**
 * Case-insensitive lookup by literal value (`succeeded`), symbolic name
 * (`SUCCEEDED`) or runner alias (`successful`).
 */
export function resolveJobStatus(candidate: string): JobStatus | undefined {
  const folded = candidate.trim().toLowerCase()

  for (const [name, value] of Object.entries(JobStatus)) {
    if (folded === value || folded === name.toLowerCase()) return value
  }

  return STATUS_ALIASES[folded]
}

export type JobStatusCategory = "accepted" | "running" | "finished-success" | "finished-failure"

export function statusCategory(status: JobStatus): JobStatusCategory {
  switch (status) {
    case JobStatus.ACCEPTED:
      return "accepted"
    case JobStatus.RUNNING:
      return "running"
    case JobStatus.SUCCEEDED:
      return "finished-success"
    case JobStatus.FAILED:
    case JobStatus.DISMISSED:
      return "finished-failure"
  }
}

export function isTerminalStatus(status: JobStatus): boolean {
  return status === JobStatus.SUCCEEDED || status === JobStatus.FAILED || status === JobStatus.DISMISSED
}

/** Category names usable in a `status` filter, with the statuses each expands to. */
export const statusFilterCategories: Readonly<Record<string, readonly JobStatus[]>> = {
  accepted: [JobStatus.ACCEPTED],
  running: [JobStatus.RUNNING],
  finished: [JobStatus.SUCCEEDED, JobStatus.FAILED, JobStatus.DISMISSED],
  "finished-success": [JobStatus.SUCCEEDED],
  "finished-failure": [JobStatus.FAILED, JobStatus.DISMISSED],
}

/** Statuses reachable from `from` (excluding itself). */
export function allowedTransitions(from: JobStatus): readonly JobStatus[] {
  switch (from) {
    case JobStatus.ACCEPTED:
      return [JobStatus.RUNNING, JobStatus.SUCCEEDED, JobStatus.FAILED, JobStatus.DISMISSED]
    case JobStatus.RUNNING:
      return [JobStatus.SUCCEEDED, JobStatus.FAILED, JobStatus.DISMISSED]
    default:
      return []
  }
}
