import { isAdmin, type RequestIdentity } from "../model/identity.model"
import { JobError } from "../model/job.errors"
import type { Job } from "../model/job.model"
import {
  type ProcessCatalog,
  type ProcessDescription,
  ProcessError,
  type ProviderDescription,
} from "../model/process.model"

function deny(identity: RequestIdentity, jobId: string): JobError {
  return identity.kind === "anonymous" ? JobError.authenticationRequired(jobId) : JobError.forbidden(jobId)
}

function isOwner(identity: RequestIdentity, job: Job): boolean {
  return identity.kind === "user" && job.userId === identity.userId
}

/** Public jobs are readable by anyone; private ones by their owner and admins. */
export function assertCanReadJob(identity: RequestIdentity, job: Job): void {
  if (job.access === "public" || isAdmin(identity) || isOwner(identity, job)) return
  throw deny(identity, job.id)
}

/** Jobs submitted anonymously have no owner and may be dismissed by anyone who can read them. */
export function assertCanModifyJob(identity: RequestIdentity, job: Job): void {
  assertCanReadJob(identity, job)
  if (job.userId === null || isAdmin(identity) || isOwner(identity, job)) return
  throw deny(identity, job.id)
}

export function assertCanUseProcess(identity: RequestIdentity, process: ProcessDescription): void {
  if (process.visibility === "public" || isAdmin(identity)) return
  if (identity.kind === "anonymous") throw JobError.authenticationRequired()
  throw ProcessError.forbidden(process.id)
}

export function assertCanUseProvider(identity: RequestIdentity, provider: ProviderDescription): void {
  if (provider.public || isAdmin(identity)) return
  if (identity.kind === "anonymous") throw JobError.authenticationRequired()
  throw ProcessError.providerForbidden(provider.id)
}

/** A job reached through a scoped path must belong to that scope. */
export function assertJobInScope(job: Job, scope: { processId?: string; providerId?: string }): void {
  if (scope.processId !== undefined && job.processId !== scope.processId) throw JobError.notFound(job.id)
  if (scope.providerId !== undefined && job.serviceId !== scope.providerId) throw JobError.notFound(job.id)
}

export async function resolveProvider(
  catalog: ProcessCatalog,
  identity: RequestIdentity,
  providerId: string,
): Promise<ProviderDescription> {
  const provider = await catalog.getProvider(providerId)
  if (!provider) throw ProcessError.providerNotFound(providerId)

  assertCanUseProvider(identity, provider)
  return provider
}

/** Looks up a process, checking the provider first when one is named. */
export async function resolveProcess(
  catalog: ProcessCatalog,
  identity: RequestIdentity,
  processId: string,
  providerId?: string,
): Promise<ProcessDescription> {
  if (providerId !== undefined) await resolveProvider(catalog, identity, providerId)

  const process = await catalog.getProcess(processId, providerId)
  if (!process) throw ProcessError.processNotFound(processId, providerId)

  assertCanUseProcess(identity, process)
  return process
}
