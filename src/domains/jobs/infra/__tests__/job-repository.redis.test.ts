import { mock } from "vitest-mock-extended"
import { createJsonCodec } from "../../../../lib/codec"
import type { RedisBytesClient } from "../../../../lib/redis"
import type { Mock } from "../../../../tests/mock"
import { Job, type JobRecord } from "../../model/job.model"
import { RedisJobRepository } from "../job-repository.redis"

const T0 = new Date("2026-02-01T00:00:00Z")
const PREFIX = "test:jobs"

describe("RedisJobRepository", () => {
  const codec = createJsonCodec<JobRecord>()
  let client: Mock<RedisBytesClient>
  let repository: RedisJobRepository
  let record: JobRecord
  let valueKey: string

  const encoded = (value: JobRecord) => Buffer.from(codec.encode(value))

  beforeEach(() => {
    client = mock<RedisBytesClient>()
    repository = new RedisJobRepository({ client, codec }, { keyspacePrefix: PREFIX })
    record = Job.create({ taskReference: "task-1", processId: "echo", inputs: {}, executeAsync: true }, T0).toRecord()
    valueKey = `${PREFIX}:jobs:${record.id}`
  })

  describe("getVersioned", () => {
    it("decodes the record and reads a byte version", async () => {
      client.eval.mockResolvedValue([encoded(record), Buffer.from("3")])

      const found = await repository.getVersioned(record.id)

      expect(found).toEqual({ kind: "found", record, version: "3" })
      expect(client.eval).toHaveBeenCalledWith(expect.any(String), {
        keys: [valueKey, `${valueKey}:v`],
        arguments: [],
      })
    })

    it("accepts a version sent as a plain string", async () => {
      client.eval.mockResolvedValue([encoded(record), "0"])

      const found = await repository.getVersioned(record.id)

      expect(found.kind === "found" && found.version).toBe("0")
    })

    it("reports a missing record", async () => {
      client.eval.mockResolvedValue(null)

      expect(await repository.getVersioned(record.id)).toEqual({ kind: "not_found" })
    })

    it("rejects a reply that is not a pair", async () => {
      client.eval.mockResolvedValue(42)

      await expect(repository.getVersioned(record.id)).rejects.toMatchObject({
        code: "redis_unexpected_reply",
        context: { script: "get_versioned", reply: "42" },
      })
    })

    it("rejects a version that is neither bytes nor text", async () => {
      client.eval.mockResolvedValue([encoded(record), 7])

      await expect(repository.getVersioned(record.id)).rejects.toMatchObject({
        code: "redis_unexpected_reply",
        context: { script: "get_versioned", reply: "7" },
      })
    })
  })

  describe("insert", () => {
    it("writes the record, its version and the index together", async () => {
      client.eval.mockResolvedValue(Buffer.from("written"))

      await repository.insert(record)

      expect(client.eval).toHaveBeenCalledWith(expect.any(String), {
        keys: [valueKey, `${valueKey}:v`, `${PREFIX}:jobs-index`],
        arguments: [encoded(record), record.id],
      })
    })

    it("refuses an id that already exists", async () => {
      client.eval.mockResolvedValue("exists")

      await expect(repository.insert(record)).rejects.toMatchObject({
        code: "job_exists",
        context: { jobId: record.id },
      })
    })
  })

  describe("replaceIfVersion", () => {
    it("returns the new version after a write", async () => {
      client.eval.mockResolvedValue(Buffer.from("4"))

      expect(await repository.replaceIfVersion(record, "3")).toEqual({ kind: "written", version: "4" })
      expect(client.eval).toHaveBeenCalledWith(expect.any(String), {
        keys: [valueKey, `${valueKey}:v`],
        arguments: ["3", encoded(record)],
      })
    })

    it("maps conflict and missing replies", async () => {
      client.eval.mockResolvedValueOnce(Buffer.from("conflict")).mockResolvedValueOnce("not_found")

      expect(await repository.replaceIfVersion(record, "3")).toEqual({ kind: "conflict" })
      expect(await repository.replaceIfVersion(record, "3")).toEqual({ kind: "not_found" })
    })

    it("rejects a malformed reply", async () => {
      client.eval.mockResolvedValue(undefined)

      await expect(repository.replaceIfVersion(record, "3")).rejects.toMatchObject({
        code: "redis_unexpected_reply",
        context: { script: "replace_if_version", reply: "undefined" },
      })
    })
  })

  it("reports whether a delete removed the record", async () => {
    client.eval.mockResolvedValueOnce("1").mockResolvedValueOnce(Buffer.from("0"))

    expect(await repository.delete(record.id)).toBe(true)
    expect(await repository.delete(record.id)).toBe(false)
  })

  describe("list", () => {
    it("skips index members whose record has gone", async () => {
      client.sMembers.mockResolvedValue([Buffer.from(record.id), Buffer.from("gone")])
      client.mGet.mockResolvedValue([encoded(record), null])

      expect(await repository.list()).toEqual([record])
      expect(client.sMembers).toHaveBeenCalledWith(`${PREFIX}:jobs-index`)
      expect(client.mGet).toHaveBeenCalledWith([valueKey, `${PREFIX}:jobs:gone`])
    })

    it("does not read values for an empty index", async () => {
      client.sMembers.mockResolvedValue([])

      expect(await repository.list()).toEqual([])
      expect(client.mGet).not.toHaveBeenCalled()
    })
  })
})
