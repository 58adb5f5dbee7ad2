export type { Clock, Milliseconds, Sleeper, TimeSource } from "./clock"
export { FakeClock } from "./fake-clock"
export { SystemClock } from "./system-clock"
