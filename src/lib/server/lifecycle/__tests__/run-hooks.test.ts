import { mock } from "vitest-mock-extended"
import type { Mock } from "../../../../tests/mock"
import { FakeClock } from "../../../clock"
import type { Logger } from "../../../logger"
import type { LifecycleHook } from "../lifecycle-hook"
import { runHooks } from "../run-hooks"

describe("runHooks", () => {
  let logger: Mock<Logger>
  let clock: FakeClock

  beforeEach(() => {
    logger = mock<Logger>()
    clock = new FakeClock(0)
  })

  const ctx = (deadlineMs = 1_000_000) => ({ phase: "startup" as const, clock, logger, deadlineMs })

  it("runs hooks in order", async () => {
    const order: string[] = []
    const hooks: LifecycleHook[] = [
      { name: "a", fn: async () => void order.push("a") },
      { name: "b", fn: async () => void order.push("b") },
    ]

    const res = await runHooks(ctx(), hooks, true)

    expect(order).toStrictEqual(["a", "b"])
    expect(res).toStrictEqual({ ok: true, failures: [], timedOut: false })
    expect(logger.info).toHaveBeenCalledWith("Executed startup hook a")
  })

  it("stops at the first failure when failing fast", async () => {
    const error = new Error("boom")
    const later = vi.fn(async () => {})
    const hooks: LifecycleHook[] = [
      {
        name: "bad",
        fn: async () => {
          throw error
        },
      },
      { name: "later", fn: later },
    ]

    const res = await runHooks(ctx(), hooks, true)

    expect(res).toStrictEqual({ ok: false, failures: [{ hook: "bad", error }], timedOut: false })
    expect(later).not.toHaveBeenCalled()
  })

  it("collects every failure otherwise", async () => {
    const hooks: LifecycleHook[] = [
      {
        name: "first",
        fn: async () => {
          throw new Error("one")
        },
      },
      {
        name: "second",
        fn: async () => {
          throw new Error("two")
        },
      },
    ]

    const res = await runHooks(ctx(), hooks, false)

    expect(res.ok).toBe(false)
    expect(res.failures.map((failure) => failure.hook)).toStrictEqual(["first", "second"])
  })

  it("skips hooks once the deadline has passed", async () => {
    const skipped = vi.fn(async () => {})
    const hooks: LifecycleHook[] = [
      { name: "slow", fn: async () => clock.advance(500) },
      { name: "skipped", fn: skipped },
    ]

    const res = await runHooks(ctx(500), hooks, false)

    expect(res).toStrictEqual({ ok: false, failures: [], timedOut: true })
    expect(skipped).not.toHaveBeenCalled()
  })

  it("passes the remaining budget to each hook", async () => {
    const seen: number[] = []
    const hooks: LifecycleHook[] = [
      {
        name: "a",
        fn: async ({ timeRemainingMs }) => {
          seen.push(timeRemainingMs)
          clock.advance(200)
        },
      },
      { name: "b", fn: async ({ timeRemainingMs }) => void seen.push(timeRemainingMs) },
    ]

    await runHooks(ctx(1000), hooks, true)

    expect(seen).toStrictEqual([1000, 800])
  })
})
