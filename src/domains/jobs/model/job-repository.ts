import type { JobId, JobRecord } from "./job.model"

/** Opaque token; only compare it for equality. */
export type JobVersion = string

export type VersionedJobRecord =
  | { readonly kind: "found"; readonly record: JobRecord; readonly version: JobVersion }
  | { readonly kind: "not_found" }

export type JobWriteResult =
  | { readonly kind: "written"; readonly version: JobVersion }
  | { readonly kind: "conflict" }
  | { readonly kind: "not_found" }

/**
 * Storage for job records. Writes are single-record compare-and-swap so
 * concurrent runner reports never overwrite each other blindly.
 */
export interface JobRepository {
  getVersioned(id: JobId): Promise<VersionedJobRecord>
  insert(record: JobRecord): Promise<void>
  replaceIfVersion(record: JobRecord, expected: JobVersion): Promise<JobWriteResult>
  /** Returns false when no record existed. */
  delete(id: JobId): Promise<boolean>
  /** Snapshot of every stored record, in no particular order. */
  list(): Promise<JobRecord[]>
}
