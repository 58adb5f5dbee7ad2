import type { Milliseconds } from "../../clock"
import type { ReadinessCheck, ResolvedHealthConfig } from "../server-options"
import type { Application } from "../types/http"

const NO_CACHE = { "Cache-Control": "no-store, no-cache, must-revalidate" } as const

type CheckOutcome = { ok: true } | { ok: false; reason: string }

export function registerHealthRoutes(
  app: Application,
  config: ResolvedHealthConfig,
  isReady: () => boolean,
): void {
  if (!config.enabled) return

  app.get(config.livenessPath, (c) => c.json({ ok: true }, 200, NO_CACHE))

  app.get(config.readinessPath, async (c) => {
    if (!isReady()) return c.json({ ok: false, reason: "starting" }, 503, NO_CACHE)

    for (const check of config.readinessChecks) {
      const outcome = await runCheck(check, check.timeoutMs ?? config.checkTimeoutMs)
      if (!outcome.ok) return c.json({ ok: false, reason: outcome.reason }, 503, NO_CACHE)
    }

    return c.json({ ok: true }, 200, NO_CACHE)
  })
}

async function runCheck(check: ReadinessCheck, timeoutMs: Milliseconds): Promise<CheckOutcome> {
  const controller = new AbortController()
  const timer = setTimeout(() => controller.abort(), timeoutMs)

  try {
    const healthy = await check.fn(controller.signal)
    if (controller.signal.aborted) return { ok: false, reason: `${check.name}:timeout` }

    return healthy ? { ok: true } : { ok: false, reason: check.name }
  } catch {
    return {
      ok: false,
      reason: controller.signal.aborted ? `${check.name}:timeout` : `${check.name}:error`,
    }
  } finally {
    clearTimeout(timer)
  }
}
