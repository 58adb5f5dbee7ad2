import { z } from "zod/mini"

const nonNegative = z.coerce.number().check(z.gte(0), z.multipleOf(1))

const TRUTHY = new Set(["true", "1", "yes", "on"])

/** Any value outside the truthy words reads as false. */
const truthyFlag = z._default(
  z.pipe(
    z.string(),
    z.transform((value: string) => TRUTHY.has(value.trim().toLowerCase())),
  ),
  false,
)

export type PagingLimits = {
  defaultLimit: number
  maxLimit: number
}

export function createJobListQuerySchema(paging: PagingLimits) {
  return z.object({
    process: z.optional(z.string()),
    processID: z.optional(z.string()),
    provider: z.optional(z.string()),
    service: z.optional(z.string()),
    type: z.optional(z.string()),
    status: z.optional(z.string()),
    tags: z.optional(z.string()),
    access: z.optional(z.string()),
    notification: z.optional(z.string()),
    notification_email: z.optional(z.string()),
    datetime: z.optional(z.string()),
    minDuration: z.optional(nonNegative),
    maxDuration: z.optional(nonNegative),
    groups: z.optional(z.string()),
    sort: z.optional(z.string()),
    detail: truthyFlag,
    page: z._default(nonNegative, 0),
    limit: z._default(
      z.coerce.number().check(
        z.gt(0, { error: "limit must be positive" }),
        z.lte(paging.maxLimit, { error: `limit cannot exceed ${paging.maxLimit}` }),
        z.multipleOf(1),
      ),
      paging.defaultLimit,
    ),
  })
}

export type JobListQuery = z.infer<ReturnType<typeof createJobListQuerySchema>>

export const executeRequestSchema = z.object({
  inputs: z._default(z.record(z.string(), z.unknown()), {}),
  outputs: z.optional(z.record(z.string(), z.unknown())),
  access: z.optional(z.enum(["public", "private"])),
  tags: z.optional(z.array(z.string())),
  notification_email: z.optional(z.string().check(z.minLength(1))),
})

export type ExecuteRequest = z.infer<typeof executeRequestSchema>

export const runnerReportSchema = z.object({
  status: z.optional(z.string()),
  progress: z.optional(z.number()),
  message: z.optional(z.string()),
  log: z.optional(
    z.object({
      message: z.string().check(z.minLength(1)),
      level: z.optional(z.enum(["debug", "info", "warning", "error"])),
    }),
  ),
  exception: z.optional(
    z.object({
      code: z.string().check(z.minLength(1)),
      message: z.string(),
      locator: z.optional(z.string()),
    }),
  ),
  result: z.optional(
    z.object({
      id: z.string().check(z.minLength(1)),
      href: z.optional(z.string()),
      mediaType: z.optional(z.string()),
      value: z.optional(z.unknown()),
    }),
  ),
  taskReference: z.optional(z.string()),
  contextCorrelationId: z.optional(z.string()),
})

export type RunnerReportRequest = z.infer<typeof runnerReportSchema>

export const dismissJobsRequestSchema = z.object({
  jobs: z.array(z.string()).check(z.minLength(1, { error: "At least one job id is required" })),
})
