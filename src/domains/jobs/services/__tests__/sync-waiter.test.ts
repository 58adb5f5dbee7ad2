import { FakeClock } from "../../../../lib/clock"
import type { Job } from "../../model/job.model"
import { waitForJobCompletion } from "../sync-waiter"
import { seedJob, T0 } from "./job-fixtures"

const pending = seedJob({ n: 1, processId: "echo", access: "public", status: "accepted" })
const done = seedJob({ n: 1, processId: "echo", access: "public", status: "succeeded" })

function sequence(...jobs: Job[]): () => Promise<Job> {
  let call = 0
  return async () => jobs[Math.min(call++, jobs.length - 1)] ?? pending
}

describe("waitForJobCompletion", () => {
  let clock: FakeClock

  beforeEach(() => {
    clock = new FakeClock(T0)
  })

  it("returns at once for a finished job", async () => {
    const outcome = await waitForJobCompletion(clock, sequence(done), { timeoutSeconds: 5, pollIntervalMs: 1000 })

    expect(outcome).toEqual({ kind: "finished", job: done })
    expect(clock.sleeps).toEqual([])
  })

  it("polls until the job finishes", async () => {
    const outcome = await waitForJobCompletion(clock, sequence(pending, pending, done), {
      timeoutSeconds: 5,
      pollIntervalMs: 1000,
    })

    expect(outcome.kind).toBe("finished")
    expect(clock.sleeps).toEqual([1000, 1000])
  })

  it("caps the last sleep by the time left and then times out", async () => {
    const outcome = await waitForJobCompletion(clock, sequence(pending), { timeoutSeconds: 2.5, pollIntervalMs: 1000 })

    expect(outcome).toEqual({ kind: "timed_out", job: pending })
    expect(clock.sleeps).toEqual([1000, 1000, 500])
    expect(clock.nowMs()).toBe(T0.getTime() + 2500)
  })

  it("stops when the signal aborts", async () => {
    const controller = new AbortController()
    controller.abort()

    const outcome = await waitForJobCompletion(clock, sequence(pending), {
      timeoutSeconds: 5,
      pollIntervalMs: 1000,
      signal: controller.signal,
    })

    expect(outcome.kind).toBe("aborted")
    expect(clock.sleeps).toEqual([])
  })
})
