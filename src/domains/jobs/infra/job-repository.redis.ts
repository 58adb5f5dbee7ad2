import type { Codec } from "../../../lib/codec"
import { BaseError } from "../../../lib/errors"
import type { RedisBytesClient } from "../../../lib/redis"
import type { JobId, JobRecord } from "../model/job.model"
import type { JobRepository, JobVersion, JobWriteResult, VersionedJobRecord } from "../model/job-repository"

export type RedisJobRepositoryDeps = {
  client: RedisBytesClient
  codec: Codec<JobRecord>
}

export type RedisJobRepositoryOptions = {
  keyspacePrefix: string
}

const INSERT_SCRIPT = `
  -- KEYS[1] = value key, KEYS[2] = version key, KEYS[3] = index set
  -- ARGV[1] = value, ARGV[2] = job id
  if redis.call('EXISTS', KEYS[1]) == 1 then
    return 'exists'
  end

  redis.call('SET', KEYS[1], ARGV[1])
  redis.call('INCR', KEYS[2])
  redis.call('SADD', KEYS[3], ARGV[2])
  return 'written'
`

const GET_VERSIONED_SCRIPT = `
  local value = redis.call('GET', KEYS[1])
  if not value then
    return nil
  end

  local version = redis.call('GET', KEYS[2])
  if not version then
    version = '0'
  end

  return { value, version }
`

const REPLACE_IF_VERSION_SCRIPT = `
  -- KEYS[1] = value key, KEYS[2] = version key
  -- ARGV[1] = expected version, ARGV[2] = new value
  if not redis.call('GET', KEYS[1]) then
    return 'not_found'
  end

  local current = redis.call('GET', KEYS[2])
  if not current then
    current = '0'
  end

  if current ~= ARGV[1] then
    return 'conflict'
  end

  redis.call('SET', KEYS[1], ARGV[2])
  return tostring(redis.call('INCR', KEYS[2]))
`

const DELETE_SCRIPT = `
  -- KEYS[1] = value key, KEYS[2] = version key, KEYS[3] = index set
  -- ARGV[1] = job id
  local removed = redis.call('DEL', KEYS[1])
  redis.call('DEL', KEYS[2])
  redis.call('SREM', KEYS[3], ARGV[1])
  return tostring(removed)
`

function unexpectedReply(script: string, reply: unknown): BaseError {
  return new BaseError("Unexpected reply from Redis", {
    code: "redis_unexpected_reply",
    context: { script, reply: String(reply) },
    isOperational: false,
  })
}

function asText(script: string, reply: unknown): string {
  if (Buffer.isBuffer(reply)) return reply.toString("utf8")
  if (typeof reply === "string") return reply

  throw unexpectedReply(script, reply)
}

/**
 * Redis-backed repository. Each record lives under its own key with a
 * sibling version counter (`<key>:v`); a set indexes every job id for
 * listings. All writes run as Lua scripts so record, version and index
 * change together.
 */
export class RedisJobRepository implements JobRepository {
  public constructor(
    private readonly deps: RedisJobRepositoryDeps,
    private readonly opts: RedisJobRepositoryOptions,
  ) {}

  async getVersioned(id: JobId): Promise<VersionedJobRecord> {
    const key = this.keyForJob(id)
    const reply = await this.deps.client.eval(GET_VERSIONED_SCRIPT, {
      keys: [key, this.versionKey(key)],
      arguments: [],
    })

    if (reply === null) return { kind: "not_found" }
    if (!Array.isArray(reply)) throw unexpectedReply("get_versioned", reply)

    const [value, version]: unknown[] = reply
    if (!Buffer.isBuffer(value)) throw unexpectedReply("get_versioned", value)

    return {
      kind: "found",
      record: this.deps.codec.decode(new Uint8Array(value)),
      version: asText("get_versioned", version),
    }
  }

  async insert(record: JobRecord): Promise<void> {
    const key = this.keyForJob(record.id)
    const reply = await this.deps.client.eval(INSERT_SCRIPT, {
      keys: [key, this.versionKey(key), this.keyForIndex()],
      arguments: [this.toBuffer(this.deps.codec.encode(record)), record.id],
    })

    if (asText("insert", reply) === "exists") {
      throw new BaseError(`Job ${record.id} already exists`, {
        code: "job_exists",
        context: { jobId: record.id },
        isOperational: false,
      })
    }
  }

  async replaceIfVersion(record: JobRecord, expected: JobVersion): Promise<JobWriteResult> {
    const key = this.keyForJob(record.id)
    const reply = await this.deps.client.eval(REPLACE_IF_VERSION_SCRIPT, {
      keys: [key, this.versionKey(key)],
      arguments: [expected, this.toBuffer(this.deps.codec.encode(record))],
    })

    const result = asText("replace_if_version", reply)

    if (result === "not_found") return { kind: "not_found" }
    if (result === "conflict") return { kind: "conflict" }

    return { kind: "written", version: result }
  }

  async delete(id: JobId): Promise<boolean> {
    const key = this.keyForJob(id)
    const reply = await this.deps.client.eval(DELETE_SCRIPT, {
      keys: [key, this.versionKey(key), this.keyForIndex()],
      arguments: [id],
    })

    return asText("delete", reply) !== "0"
  }

  /** Index members whose record has gone are skipped. */
  async list(): Promise<JobRecord[]> {
    const members = await this.deps.client.sMembers(this.keyForIndex())
    if (members.length === 0) return []

    const keys = members.map((member) => this.keyForJob(member.toString("utf8")))
    const values = await this.deps.client.mGet(keys)

    const records: JobRecord[] = []
    for (const value of values) {
      if (value) records.push(this.deps.codec.decode(new Uint8Array(value)))
    }

    return records
  }

  private toBuffer(value: Uint8Array): Buffer {
    return Buffer.from(value.buffer, value.byteOffset, value.byteLength)
  }

  private keyForJob(id: string): string {
    return `${this.opts.keyspacePrefix}:jobs:${id}`
  }

  private versionKey(key: string): string {
    return `${key}:v`
  }

  private keyForIndex(): string {
    return `${this.opts.keyspacePrefix}:jobs-index`
  }
}
