export type Milliseconds = number

export type TimeSource = {
  now(): Date

  /** Milliseconds since the Unix epoch. Prefer this for arithmetic. */
  nowMs(): Milliseconds
}

export interface Sleeper {
  /** Waits `ms` milliseconds. Resolves early once `signal` aborts. */
  sleep(ms: Milliseconds, signal?: AbortSignal): Promise<void>
}

export type Clock = TimeSource & Sleeper
