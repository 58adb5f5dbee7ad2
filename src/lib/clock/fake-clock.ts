import type { Clock, Milliseconds } from "./clock"

/**
 * Manually driven clock for tests. `sleep` moves virtual time forward by
 * the requested amount and resolves on the next microtask, so polling
 * loops run to completion without real timers.
 */
export class FakeClock implements Clock {
  private time: Milliseconds
  private slept: Milliseconds[] = []

  constructor(start: Date | Milliseconds = 0) {
    this.time = typeof start === "number" ? start : start.getTime()
  }

  now(): Date {
    return new Date(this.time)
  }

  nowMs(): Milliseconds {
    return this.time
  }

  advance(ms: Milliseconds): void {
    this.time += ms
  }

  set(at: Date | Milliseconds): void {
    this.time = typeof at === "number" ? at : at.getTime()
  }

  /** Durations passed to `sleep`, in call order. */
  get sleeps(): readonly Milliseconds[] {
    return this.slept
  }

  async sleep(ms: Milliseconds, signal?: AbortSignal): Promise<void> {
    if (signal?.aborted) return
    this.slept.push(ms)
    if (ms > 0) this.time += ms
  }
}
