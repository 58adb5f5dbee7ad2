import type { AppConfig } from "../../../app/config"
import { type Application, createRouter } from "../../../lib/server"
import type { JobServices } from "../composition"
import { dismissJobHandler, dismissJobsHandler } from "./dismiss-job.handler"
import { executeProcessHandler } from "./execute-process.handler"
import { getJobHandler } from "./get-job.handler"
import { identityMiddleware } from "./identity.middleware"
import {
  jobExceptionsHandler,
  jobLogsHandler,
  jobOutputsHandler,
  jobResultsHandler,
} from "./job-artifacts.handler"
import { listJobsHandler } from "./list-jobs.handler"
import { reportJobHandler } from "./report-job.handler"

type JobsModuleDeps = {
  config: AppConfig
  jobs: JobServices
}

const PROCESS = "/processes/:processId"
const PROVIDER = "/providers/:providerId"
const PROVIDER_PROCESS = `${PROVIDER}${PROCESS}`

export function createJobsModule(deps: JobsModuleDeps) {
  const { config, jobs } = deps

  return {
    name: "jobs",
    register: (api: Application) => {
      const router = createRouter()
      router.use("*", identityMiddleware(config.identity))

      router.get("/jobs", listJobsHandler(jobs, config))
      router.delete("/jobs", dismissJobsHandler(jobs))
      router.get(`${PROCESS}/jobs`, listJobsHandler(jobs, config))
      router.get(`${PROVIDER}/jobs`, listJobsHandler(jobs, config))
      router.get(`${PROVIDER_PROCESS}/jobs`, listJobsHandler(jobs, config))

      for (const scope of ["", PROCESS, PROVIDER, PROVIDER_PROCESS]) {
        router.get(`${scope}/jobs/:jobId`, getJobHandler(jobs, config))
        router.delete(`${scope}/jobs/:jobId`, dismissJobHandler(jobs, config))
        router.get(`${scope}/jobs/:jobId/logs`, jobLogsHandler(jobs))
        router.get(`${scope}/jobs/:jobId/exceptions`, jobExceptionsHandler(jobs))
        router.get(`${scope}/jobs/:jobId/results`, jobResultsHandler(jobs))
        router.get(`${scope}/jobs/:jobId/outputs`, jobOutputsHandler(jobs, config))
      }

      router.post("/jobs/:jobId/reports", reportJobHandler(jobs, config))

      router.post(`${PROCESS}/execution`, executeProcessHandler(jobs, config))
      router.post(`${PROVIDER_PROCESS}/execution`, executeProcessHandler(jobs, config))

      api.route("/", router)
    },
  }
}
