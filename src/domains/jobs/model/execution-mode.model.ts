export type ExecutionMode = "sync" | "async"

export type ExecutionModeDecision = {
  mode: ExecutionMode
  /** Seconds to wait inline for a sync result; null for async. */
  waitSeconds: number | null
  /** Response headers echoing the preferences that were honored. */
  appliedPreferenceHeader: Record<string, string>
}

/** Recognised parts of a `Prefer` header. */
export type ExecutionPreference = {
  respondAsync: boolean
  wait?: number
}
