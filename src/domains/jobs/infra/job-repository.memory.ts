import type { Codec } from "../../../lib/codec"
import { BaseError } from "../../../lib/errors"
import type { JobId, JobRecord } from "../model/job.model"
import type { JobRepository, JobVersion, JobWriteResult, VersionedJobRecord } from "../model/job-repository"

type MemoryEntry = {
  bytes: Uint8Array
  version: JobVersion
}

export type MemoryJobRepositoryDeps = {
  codec: Codec<JobRecord>
}

/**
 * Process-local repository. Records are stored encoded so callers never
 * share mutable state with the store.
 */
export class MemoryJobRepository implements JobRepository {
  private readonly entries = new Map<JobId, MemoryEntry>()
  private versionCounter = 0

  public constructor(private readonly deps: MemoryJobRepositoryDeps) {}

  async getVersioned(id: JobId): Promise<VersionedJobRecord> {
    const entry = this.entries.get(id)
    if (!entry) return { kind: "not_found" }

    return { kind: "found", record: this.deps.codec.decode(entry.bytes), version: entry.version }
  }

  async insert(record: JobRecord): Promise<void> {
    if (this.entries.has(record.id)) {
      throw new BaseError(`Job ${record.id} already exists`, {
        code: "job_exists",
        context: { jobId: record.id },
        isOperational: false,
      })
    }

    this.entries.set(record.id, { bytes: this.deps.codec.encode(record), version: this.nextVersion() })
  }

  async replaceIfVersion(record: JobRecord, expected: JobVersion): Promise<JobWriteResult> {
    const entry = this.entries.get(record.id)
    if (!entry) return { kind: "not_found" }
    if (entry.version !== expected) return { kind: "conflict" }

    const version = this.nextVersion()
    this.entries.set(record.id, { bytes: this.deps.codec.encode(record), version })

    return { kind: "written", version }
  }

  async delete(id: JobId): Promise<boolean> {
    return this.entries.delete(id)
  }

  async list(): Promise<JobRecord[]> {
    return [...this.entries.values()].map((entry) => this.deps.codec.decode(entry.bytes))
  }

  private nextVersion(): JobVersion {
    this.versionCounter++
    return String(this.versionCounter)
  }
}
