import type { RequestIdentity } from "../model/identity.model"
import type { Job, JobId } from "../model/job.model"
import type { JobListScope, JobQueryResult, JobQuerySpec } from "../model/job-query.model"
import type { ProcessCatalog } from "../model/process.model"
import { assertCanReadJob, assertJobInScope, resolveProcess, resolveProvider } from "./job-access"
import type { JobLifecycleController } from "./job-lifecycle"
import type { JobQueryEngine } from "./job-query-engine"
import { buildJobQuerySpec, type JobListParams } from "./job-query-parser"
import type { NotificationTransform } from "./notification-transform"

export type JobListingDeps = {
  catalog: ProcessCatalog
  engine: JobQueryEngine
  lifecycle: JobLifecycleController
  notify: NotificationTransform
}

export type JobListing = {
  spec: JobQuerySpec
  result: JobQueryResult
}

export type JobPathScope = {
  processId?: string
  providerId?: string
}

/** Read side of the jobs API: scoped listings and single-job lookups. */
export class JobListingService {
  public constructor(private readonly deps: JobListingDeps) {}

  async list(params: JobListParams, scope: JobListScope, identity: RequestIdentity): Promise<JobListing> {
    await this.assertScope(scope, identity)

    const spec = buildJobQuerySpec(params, scope, identity, this.deps.notify)
    const result = await this.deps.engine.query(spec)

    return { spec, result }
  }

  /** Loads a job the caller may see, reached through an optional scoped path. */
  async getVisibleJob(jobId: JobId, identity: RequestIdentity, scope: JobPathScope = {}): Promise<Job> {
    const job = await this.deps.lifecycle.get(jobId)

    assertJobInScope(job, scope)
    assertCanReadJob(identity, job)

    return job
  }

  private async assertScope(scope: JobListScope, identity: RequestIdentity): Promise<void> {
    const { catalog } = this.deps

    switch (scope.kind) {
      case "global":
        return
      case "process":
        await resolveProcess(catalog, identity, scope.processId)
        return
      case "provider":
        await resolveProvider(catalog, identity, scope.providerId)
        return
      case "provider-process":
        await resolveProcess(catalog, identity, scope.processId, scope.providerId)
        return
    }
  }
}
