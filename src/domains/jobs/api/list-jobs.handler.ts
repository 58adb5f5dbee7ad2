import type { AppConfig } from "../../../app/config"
import { parseOrThrow } from "../../../lib/errors"
import type { Context, RequestHandler } from "../../../lib/server"
import type { JobServices } from "../composition"
import { buildListingLinks } from "../services/job-links"
import type { JobListParams } from "../services/job-query-parser"
import { createJobListQuerySchema, type JobListQuery } from "./job.api.schema"
import { type JobListingBody, presentListing } from "./job.presenter"
import { apiBaseUrl, firstValues, listingScope, queryPairs } from "./request-context"

function toJobListParams(query: JobListQuery): JobListParams {
  const process = query.process ?? query.processID
  const provider = query.provider ?? query.service
  const notification = query.notification ?? query.notification_email

  return {
    page: query.page,
    limit: query.limit,
    ...(process !== undefined && { process }),
    ...(provider !== undefined && { provider }),
    ...(notification !== undefined && { notification }),
    ...(query.type !== undefined && { type: query.type }),
    ...(query.status !== undefined && { status: query.status }),
    ...(query.tags !== undefined && { tags: query.tags }),
    ...(query.access !== undefined && { access: query.access }),
    ...(query.datetime !== undefined && { datetime: query.datetime }),
    ...(query.minDuration !== undefined && { minDuration: query.minDuration }),
    ...(query.maxDuration !== undefined && { maxDuration: query.maxDuration }),
    ...(query.groups !== undefined && { groups: query.groups }),
    ...(query.sort !== undefined && { sort: query.sort }),
  }
}

export function listJobsHandler({ listing, clock }: JobServices, config: AppConfig): RequestHandler {
  const schema = createJobListQuerySchema(config.jobs.paging)

  return async (c: Context) => {
    const pairs = queryPairs(c)
    const query = parseOrThrow(schema, firstValues(pairs))
    const scope = listingScope(c)

    const { result } = await listing.list(toJobListParams(query), scope, c.get("identity"))

    const baseUrl = apiBaseUrl(c, config)
    const links = buildListingLinks({
      baseUrl,
      scope,
      query: pairs,
      ...(result.kind === "paged" && {
        paging: { page: result.page, limit: result.limit, total: result.total },
      }),
    })

    return c.json<JobListingBody>(
      presentListing(result, { detail: query.detail, now: clock.now(), baseUrl, links }),
    )
  }
}
