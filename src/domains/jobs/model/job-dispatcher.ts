import type { JobId } from "./job.model"

export type JobDispatchRequest = {
  jobId: JobId
  taskReference: string
  processId: string
  serviceId: string | null
  inputs: Readonly<Record<string, unknown>>
  outputs: Readonly<Record<string, unknown>>
  executeAsync: boolean
}

/** Hands jobs to the external runner and asks it to stop them. */
export interface JobDispatcher {
  dispatch(request: JobDispatchRequest): Promise<void>
  /** Best-effort; the runner may finish the work anyway. */
  revoke(jobId: JobId, taskReference: string): Promise<void>
}
