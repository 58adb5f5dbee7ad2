import { FakeClock } from "../../../../lib/clock"
import { anonymous, type RequestIdentity } from "../../model/identity.model"
import type { JobQueryResult, JobQuerySpec } from "../../model/job-query.model"
import type { Job } from "../../model/job.model"
import { JobQueryEngine } from "../job-query-engine"
import { createMemoryRepository, minutes, seedRepository, taskRefs } from "./job-fixtures"

const alice: RequestIdentity = { kind: "user", userId: "alice", permission: "user" }
const admin: RequestIdentity = { kind: "user", userId: "root", permission: "admin" }

function pagedJobs(result: JobQueryResult): Job[] {
  if (result.kind !== "paged") throw new Error(`expected a paged result, got ${result.kind}`)
  return result.jobs
}

describe("JobQueryEngine", () => {
  let engine: JobQueryEngine

  const query = (spec: Partial<JobQuerySpec>) =>
    engine.query({ sort: "created", page: 0, limit: 20, identity: anonymous, ...spec })

  beforeEach(async () => {
    const repository = createMemoryRepository()
    await seedRepository(repository)
    engine = new JobQueryEngine({ repository, clock: new FakeClock(minutes(60)) })
  })

  describe("visibility", () => {
    it("shows anonymous callers public jobs only", async () => {
      const result = await query({ access: "public" })

      expect(taskRefs(pagedJobs(result))).toEqual(["task-10", "task-8", "task-6", "task-5", "task-3", "task-1"])
      expect(result.total).toBe(6)
    })

    it("ignores a private access request from anonymous callers", async () => {
      const result = await query({ access: "private" })

      expect(result.total).toBe(6)
    })

    it("shows an authenticated user their own jobs only", async () => {
      const result = await query({ identity: alice })

      expect(taskRefs(pagedJobs(result))).toEqual(["task-10", "task-7", "task-2", "task-1"])
    })

    it("narrows a user's own jobs by access", async () => {
      const result = await query({ identity: alice, access: "private" })

      expect(taskRefs(pagedJobs(result))).toEqual(["task-7", "task-2"])
    })

    it("lets admins see private jobs across owners", async () => {
      const result = await query({ identity: admin, access: "private" })

      expect(taskRefs(pagedJobs(result))).toEqual(["task-11", "task-9", "task-7", "task-4", "task-2"])
    })
  })

  describe("filters", () => {
    it("matches process and provider", async () => {
      expect(taskRefs(pagedJobs(await query({ identity: admin, processId: "ndvi" })))).toEqual([
        "task-6",
        "task-5",
        "task-4",
      ])
      expect(taskRefs(pagedJobs(await query({ identity: admin, serviceId: "remote-eo" })))).toEqual([
        "task-8",
        "task-7",
      ])
    })

    it("separates local and provider jobs by type", async () => {
      const provider = await query({ identity: admin, jobType: "provider" })
      const local = await query({ identity: admin, jobType: "process" })

      expect(provider.total).toBe(2)
      expect(local.total).toBe(9)
    })

    it("matches any of the given statuses", async () => {
      const result = await query({ identity: admin, statuses: ["failed", "dismissed"] })

      expect(taskRefs(pagedJobs(result))).toEqual(["task-10", "task-8", "task-4"])
    })

    it("requires every tag", async () => {
      const result = await query({ tags: ["batch", "async"] })

      expect(taskRefs(pagedJobs(result))).toEqual(["task-3", "task-1"])
    })

    it("excludes jobs that never started from duration filters", async () => {
      expect(taskRefs(pagedJobs(await query({ minDuration: 0 })))).toEqual(["task-5", "task-1"])
      expect(taskRefs(pagedJobs(await query({ minDuration: 60, maxDuration: 60 })))).toEqual(["task-5", "task-1"])
      expect((await query({ maxDuration: 59 })).total).toBe(0)
    })

    it("measures running jobs up to now", async () => {
      const result = await query({ identity: admin, statuses: ["running"], minDuration: 50 * 60 })

      expect(taskRefs(pagedJobs(result))).toEqual(["task-2"])
    })

    it("filters on creation time", async () => {
      const result = await query({ datetime: { kind: "before", before: minutes(5) } })

      expect(taskRefs(pagedJobs(result))).toEqual(["task-5", "task-3", "task-1"])
    })
  })

  describe("sorting", () => {
    it("puts unfinished jobs last when sorting by finish time", async () => {
      const jobs = pagedJobs(await query({ sort: "finished" }))

      expect(taskRefs(jobs).slice(0, 4)).toEqual(["task-10", "task-8", "task-5", "task-1"])
      expect(taskRefs(jobs).slice(4).sort()).toEqual(["task-3", "task-6"])
    })

    it("sorts ids ascending", async () => {
      const jobs = pagedJobs(await query({ sort: "id" }))
      const ids = jobs.map((job) => job.id)

      expect(ids).toEqual([...ids].sort())
    })
  })

  describe("paging", () => {
    it("slices pages and keeps the full total", async () => {
      const first = await query({ limit: 4, page: 0 })
      const second = await query({ limit: 4, page: 1 })

      expect(taskRefs(pagedJobs(first))).toEqual(["task-10", "task-8", "task-6", "task-5"])
      expect(taskRefs(pagedJobs(second))).toEqual(["task-3", "task-1"])
      expect(second.total).toBe(6)
    })

    it("returns no jobs past the last page", async () => {
      const result = await query({ limit: 4, page: 2 })

      expect(pagedJobs(result)).toEqual([])
      expect(result.total).toBe(6)
    })
  })

  describe("grouping", () => {
    it("groups in order of first appearance and accounts for every job", async () => {
      const result = await query({ groupBy: ["process"] })
      if (result.kind !== "grouped") throw new Error("expected groups")

      expect(
        result.groups.map((group) => ({ category: group.category, jobs: taskRefs(group.jobs), count: group.count })),
      ).toEqual([
        { category: { process: "jsonarray2netcdf" }, jobs: ["task-10"], count: 1 },
        { category: { process: "sentinel-mosaic" }, jobs: ["task-8"], count: 1 },
        { category: { process: "ndvi" }, jobs: ["task-6", "task-5"], count: 2 },
        { category: { process: "echo" }, jobs: ["task-3", "task-1"], count: 2 },
      ])
      expect(result.groups.reduce((sum, group) => sum + group.count, 0)).toBe(result.total)
    })

    it("reports provider groups under the requested name", async () => {
      const result = await query({ identity: admin, groupBy: ["provider"] })
      if (result.kind !== "grouped") throw new Error("expected groups")

      expect(result.groups.map((group) => [group.category, group.count])).toEqual([
        [{ provider: null }, 9],
        [{ provider: "remote-eo" }, 2],
      ])
    })
  })
})
