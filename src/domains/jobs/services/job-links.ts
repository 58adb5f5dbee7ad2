import type { Job } from "../model/job.model"
import type { JobListScope } from "../model/job-query.model"
import { JobStatus } from "../model/job-status"

export type JobLink = {
  href: string
  rel: string
  type: "application/json"
  title: string
}

export type QueryPairs = ReadonlyArray<readonly [string, string]>

export type ListingPaging = {
  page: number
  limit: number
  total: number
}

export type ListingLinksInput = {
  /** Absolute API root, e.g. `https://host/api/v1`. */
  baseUrl: string
  scope: JobListScope
  /** Request query parameters, in request order. */
  query: QueryPairs
  /** Omitted for grouped listings, which are not paged. */
  paging?: ListingPaging
}

const PAGING_PARAMS = new Set(["page", "limit"])
const PROCESS_PARAMS = ["process", "processid"]
const PROVIDER_PARAMS = ["provider", "service"]

function segment(value: string): string {
  return encodeURIComponent(value)
}

export function processPath(processId: string, providerId?: string | null): string {
  const process = `/processes/${segment(processId)}`
  return providerId ? `/providers/${segment(providerId)}${process}` : process
}

function scopePath(scope: JobListScope): string {
  switch (scope.kind) {
    case "global":
      return "/jobs"
    case "process":
      return `${processPath(scope.processId)}/jobs`
    case "provider":
      return `/providers/${segment(scope.providerId)}/jobs`
    case "provider-process":
      return `${processPath(scope.processId, scope.providerId)}/jobs`
  }
}

function upLink(baseUrl: string, scope: JobListScope): JobLink | undefined {
  switch (scope.kind) {
    case "global":
      return undefined
    case "process":
    case "provider-process": {
      const providerId = scope.kind === "provider-process" ? scope.providerId : undefined
      return link(baseUrl, processPath(scope.processId, providerId), [], "up", "Process description.")
    }
    case "provider":
      return link(baseUrl, `/providers/${segment(scope.providerId)}`, [], "up", "Provider description.")
  }
}

/** Parameters already encoded in the scope's path. */
function pathParams(scope: JobListScope): string[] {
  switch (scope.kind) {
    case "global":
      return []
    case "process":
      return PROCESS_PARAMS
    case "provider":
      return PROVIDER_PARAMS
    case "provider-process":
      return [...PROCESS_PARAMS, ...PROVIDER_PARAMS]
  }
}

function scopeFilters(scope: JobListScope): [string, string][] {
  switch (scope.kind) {
    case "global":
      return []
    case "process":
      return [["process", scope.processId]]
    case "provider":
      return [["provider", scope.providerId]]
    case "provider-process":
      return [
        ["process", scope.processId],
        ["provider", scope.providerId],
      ]
  }
}

function link(baseUrl: string, path: string, params: QueryPairs, rel: string, title: string): JobLink {
  const query = new URLSearchParams(params.map(([key, value]): [string, string] => [key, value])).toString()
  const href = query ? `${baseUrl}${path}?${query}` : `${baseUrl}${path}`

  return { href, rel, type: "application/json", title }
}

/**
 * Navigation links for a job listing. Filters from the request are kept on
 * every paged link, except those the scope's path already encodes.
 */
export function buildListingLinks(input: ListingLinksInput): JobLink[] {
  const { baseUrl, scope, paging } = input
  const path = scopePath(scope)
  const dropped = new Set(pathParams(scope))

  const filters = input.query.filter(([key]) => {
    const name = key.toLowerCase()
    return !PAGING_PARAMS.has(name) && !dropped.has(name)
  })

  const at = (page: number): [string, string][] =>
    paging ? [["limit", String(paging.limit)], ["page", String(page)]] : []

  const current = paging?.page ?? 0
  const links: JobLink[] = [link(baseUrl, path, [...filters, ...at(current)], "self", "Current page of job results.")]

  if (paging) {
    const last = Math.max(Math.ceil(paging.total / paging.limit) - 1, 0)

    links.push(link(baseUrl, path, [...filters, ...at(0)], "first", "First page of job results."))
    links.push(link(baseUrl, path, [...filters, ...at(last)], "last", "Last page of job results."))

    if (current < last) {
      links.push(link(baseUrl, path, [...filters, ...at(current + 1)], "next", "Next page of job results."))
    }
    if (current > 0) {
      const prev = Math.min(current - 1, last)
      links.push(link(baseUrl, path, [...filters, ...at(prev)], "prev", "Previous page of job results."))
    }
  }

  const up = upLink(baseUrl, scope)
  if (up) links.push(up)

  links.push(link(baseUrl, path, [], "collection", "Job collection of the current context."))
  links.push(link(baseUrl, "/jobs", [], "search", "Search across every job."))

  if (scope.kind !== "global") {
    const params = [...filters, ...scopeFilters(scope), ...at(current)]
    links.push(link(baseUrl, "/jobs", params, "alternate", "Same listing in the global job collection."))
  }

  const summary = filters.filter(([key]) => key.toLowerCase() !== "detail")
  links.push(
    link(baseUrl, path, [...summary, ...at(current), ["detail", "false"]], "preview", "Job listing without details."),
  )

  return links
}

/** Links of a single job; artifact links follow its status. */
export function buildJobLinks(baseUrl: string, job: Job): JobLink[] {
  const self = `/jobs/${segment(job.id)}`

  const links = [
    link(baseUrl, self, [], "self", "Job status."),
    link(baseUrl, processPath(job.processId, job.serviceId), [], "up", "Process that created the job."),
    link(baseUrl, `${self}/logs`, [], "logs", "Job execution logs."),
  ]

  if (job.status === JobStatus.SUCCEEDED && !job.resultsDismissed) {
    links.push(link(baseUrl, `${self}/results`, [], "results", "Job results."))
    links.push(link(baseUrl, `${self}/outputs`, [], "outputs", "Job outputs with links."))
  }
  if (job.status === JobStatus.FAILED) {
    links.push(link(baseUrl, `${self}/exceptions`, [], "exceptions", "Job exceptions."))
  }

  return links
}
