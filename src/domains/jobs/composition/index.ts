import type { AppConfig } from "../../../app/config"
import type { CoreServices } from "../../../app/services/core"
import type { InfraClients } from "../../../app/services/infra"
import type { Clock } from "../../../lib/clock"
import { createJsonCodec } from "../../../lib/codec"
import { LoggingJobDispatcher } from "../infra/job-dispatcher.logging"
import { MemoryJobRepository } from "../infra/job-repository.memory"
import { RedisJobRepository } from "../infra/job-repository.redis"
import { FileProcessCatalog } from "../infra/process-catalog.file"
import type { JobDispatcher } from "../model/job-dispatcher"
import type { JobRepository } from "../model/job-repository"
import type { JobRecord } from "../model/job.model"
import { JobExecutionService } from "../services/job-execution"
import { JobLifecycleController } from "../services/job-lifecycle"
import { JobListingService } from "../services/job-listing"
import { JobQueryEngine } from "../services/job-query-engine"
import { createNotificationTransform, type NotificationTransform } from "../services/notification-transform"

export type JobServices = {
  clock: Clock
  catalog: FileProcessCatalog
  repository: JobRepository
  dispatcher: JobDispatcher
  notify: NotificationTransform
  lifecycle: JobLifecycleController
  listing: JobListingService
  execution: JobExecutionService
}

function createJobRepository(config: AppConfig, infra: InfraClients): JobRepository {
  const codec = createJsonCodec<JobRecord>()

  switch (config.jobs.store) {
    case "memory":
      return new MemoryJobRepository({ codec })
    case "redis":
      return new RedisJobRepository(
        { client: infra.redisClient, codec },
        { keyspacePrefix: config.redis.keyPrefix },
      )
  }
}

export function createJobServices(
  config: AppConfig,
  core: CoreServices,
  infra: InfraClients,
): JobServices {
  const { clock } = core
  const logger = core.logger.child({ module: "jobs" })

  const repository = createJobRepository(config, infra)
  const dispatcher = new LoggingJobDispatcher({ logger })
  const catalog = new FileProcessCatalog({ file: config.jobs.catalogFile })
  const notify = createNotificationTransform(config.jobs.notificationSecret)

  const lifecycle = new JobLifecycleController(
    { repository, dispatcher, clock, logger },
    { maxWriteAttempts: config.jobs.maxWriteAttempts },
  )

  const listing = new JobListingService({
    catalog,
    engine: new JobQueryEngine({ repository, clock }),
    lifecycle,
    notify,
  })

  const execution = new JobExecutionService(
    { catalog, lifecycle, dispatcher, notify, clock, logger },
    {
      maxSyncWaitSeconds: config.jobs.sync.maxWaitSeconds,
      pollIntervalMs: config.jobs.sync.pollIntervalMs,
    },
  )

  return { clock, catalog, repository, dispatcher, notify, lifecycle, listing, execution }
}
