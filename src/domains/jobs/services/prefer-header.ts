import { JobError } from "../model/job.errors"
import type { ExecutionPreference } from "../model/execution-mode.model"

const WAIT_PATTERN = /^\d+$/

/**
 * Parses `Prefer` header values. Repeated headers count as one
 * comma-joined value; unknown tokens are ignored. Returns undefined when
 * neither `respond-async` nor `wait` is present.
 *
 * @throws JobError `invalid_preference` for a malformed or repeated wait
 */
export function parsePreferHeader(
  raw: string | readonly string[] | undefined,
): ExecutionPreference | undefined {
  const joined = typeof raw === "string" ? raw : (raw ?? []).join(",")
  const tokens = joined
    .split(",")
    .map((token) => token.trim())
    .filter((token) => token.length > 0)

  let respondAsync = false
  let wait: number | undefined

  for (const token of tokens) {
    const separator = token.indexOf("=")
    const key = (separator === -1 ? token : token.slice(0, separator)).trim().toLowerCase()
    const value = separator === -1 ? undefined : token.slice(separator + 1).trim()

    if (key === "respond-async") {
      respondAsync = true
      continue
    }

    if (WAIT_PATTERN.test(key) && value === undefined) {
      throw JobError.invalidPreference(joined, `unexpected value '${token}' after wait`)
    }

    if (key !== "wait") continue

    if (wait !== undefined) {
      throw JobError.invalidPreference(joined, "wait specified more than once")
    }
    if (value === undefined || !WAIT_PATTERN.test(value) || Number(value) <= 0) {
      throw JobError.invalidPreference(joined, "wait must be a positive integer of seconds")
    }

    wait = Number(value)
  }

  if (!respondAsync && wait === undefined) return undefined

  return { respondAsync, ...(wait !== undefined && { wait }) }
}
