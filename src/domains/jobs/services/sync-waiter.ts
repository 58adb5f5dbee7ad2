import type { Clock, Milliseconds } from "../../../lib/clock"
import type { Job } from "../model/job.model"

export type SyncWaitOutcome =
  | { kind: "finished"; job: Job }
  | { kind: "timed_out"; job: Job }
  | { kind: "aborted"; job: Job }

export type SyncWaitOptions = {
  timeoutSeconds: number
  pollIntervalMs: Milliseconds
  signal?: AbortSignal
}

/**
 * Polls `load` until the job reaches a terminal status, the timeout
 * elapses or `signal` aborts. Each sleep is capped by the time left.
 */
export async function waitForJobCompletion(
  clock: Clock,
  load: () => Promise<Job>,
  opts: SyncWaitOptions,
): Promise<SyncWaitOutcome> {
  const deadline = clock.nowMs() + opts.timeoutSeconds * 1000
  let job = await load()

  while (!job.isFinished) {
    if (opts.signal?.aborted) return { kind: "aborted", job }

    const remaining = deadline - clock.nowMs()
    if (remaining <= 0) return { kind: "timed_out", job }

    await clock.sleep(Math.min(opts.pollIntervalMs, remaining), opts.signal)
    job = await load()
  }

  return { kind: "finished", job }
}
