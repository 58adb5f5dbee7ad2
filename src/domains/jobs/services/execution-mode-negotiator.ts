import type {
  ExecutionMode,
  ExecutionModeDecision,
  ExecutionPreference,
} from "../model/execution-mode.model"
import type { JobControlOption } from "../model/process.model"

const PREFERENCE_APPLIED = "Preference-Applied"

const asyncDecision = (applied: Record<string, string> = {}): ExecutionModeDecision => ({
  mode: "async",
  waitSeconds: null,
  appliedPreferenceHeader: applied,
})

const syncDecision = (
  waitSeconds: number,
  applied: Record<string, string> = {},
): ExecutionModeDecision => ({ mode: "sync", waitSeconds, appliedPreferenceHeader: applied })

/**
 * Decides how a submission runs from the modes the process declares and
 * the caller's parsed preference. `maxWaitSeconds` caps inline waiting.
 */
export function negotiateExecutionMode(
  declared: readonly JobControlOption[],
  preference: ExecutionPreference | undefined,
  maxWaitSeconds: number,
): ExecutionModeDecision {
  const sync = declared.includes("sync-execute")
  const async = declared.includes("async-execute")

  if (!sync && !async) return asyncDecision()

  if (!preference) {
    return sync ? syncDecision(maxWaitSeconds) : asyncDecision()
  }

  if (preference.wait !== undefined && preference.wait > maxWaitSeconds) {
    return sync && !async ? syncDecision(maxWaitSeconds) : asyncDecision()
  }

  const desired: ExecutionMode = preference.respondAsync ? "async" : "sync"
  const enforced: ExecutionMode | undefined = sync && async ? undefined : sync ? "sync" : "async"

  if (enforced !== undefined && desired !== enforced) {
    return enforced === "sync" ? syncDecision(maxWaitSeconds) : asyncDecision()
  }

  if (desired === "async") {
    return asyncDecision({ [PREFERENCE_APPLIED]: "respond-async" })
  }

  return preference.wait === undefined
    ? syncDecision(maxWaitSeconds)
    : syncDecision(preference.wait, { [PREFERENCE_APPLIED]: `wait=${preference.wait}` })
}
