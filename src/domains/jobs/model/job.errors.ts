import { BaseError } from "../../../lib/errors"

export type JobErrorCode =
  | "job_not_found"
  | "job_forbidden"
  | "job_gone"
  | "authentication_required"
  | "invalid_job_transition"
  | "invalid_job_field"
  | "invalid_job_filter"
  | "invalid_preference"
  | "job_scope_mismatch"
  | "job_write_conflict"
  | "job_results_not_ready"
  | "job_results_failed"
  | "runner_unauthorized"

export class JobError extends BaseError<JobErrorCode> {
  static notFound(jobId: string): JobError {
    return new JobError(`Job ${jobId} could not be found`, {
      code: "job_not_found",
      context: { jobId },
    })
  }

  static forbidden(jobId: string): JobError {
    return new JobError(`Access to job ${jobId} is not permitted`, {
      code: "job_forbidden",
      context: { jobId },
    })
  }

  static authenticationRequired(jobId?: string): JobError {
    return new JobError("Authentication is required to access this job", {
      code: "authentication_required",
      context: { ...(jobId !== undefined && { jobId }) },
    })
  }

  static gone(jobId: string): JobError {
    return new JobError(`Job ${jobId} was dismissed and its results were removed`, {
      code: "job_gone",
      context: { jobId },
    })
  }

  static invalidTransition(jobId: string, from: string, to: string): JobError {
    return new JobError(`Job ${jobId} cannot change status from ${from} to ${to}`, {
      code: "invalid_job_transition",
      context: { jobId, from, to },
    })
  }

  static invalidField(field: string, value: unknown, reason: string): JobError {
    return new JobError(`Invalid value for job field '${field}': ${reason}`, {
      code: "invalid_job_field",
      context: { field, value },
    })
  }

  static invalidFilter(field: string, value: unknown, reason: string): JobError {
    return new JobError(`Invalid job filter '${field}': ${reason}`, {
      code: "invalid_job_filter",
      context: { field, value },
    })
  }

  static invalidPreference(value: string, reason: string): JobError {
    return new JobError(`Invalid Prefer header: ${reason}`, {
      code: "invalid_preference",
      context: { field: "Prefer", value },
    })
  }

  static scopeMismatch(field: string, pathValue: string, queryValue: string): JobError {
    return new JobError(`Query parameter '${field}' contradicts the request path`, {
      code: "job_scope_mismatch",
      context: { field, value: queryValue, expected: pathValue },
    })
  }

  static writeConflict(jobId: string, attempts: number): JobError {
    return new JobError(`Job ${jobId} kept changing during update`, {
      code: "job_write_conflict",
      context: { jobId, attempts },
      isRetryable: true,
    })
  }

  static resultsNotReady(jobId: string, status: string): JobError {
    return new JobError(`Results of job ${jobId} are not available yet`, {
      code: "job_results_not_ready",
      context: { jobId, status },
    })
  }

  static resultsFailed(jobId: string): JobError {
    return new JobError(`Results of job ${jobId} are not available because execution failed`, {
      code: "job_results_failed",
      context: { jobId },
    })
  }

  static runnerUnauthorized(): JobError {
    return new JobError("Runner token missing or invalid", { code: "runner_unauthorized" })
  }
}
