import { createJobsModule } from "../../domains/jobs/api"
import { API_PREFIX } from "../../domains/jobs/api/request-context"
import { type Application, createRouter } from "../../lib/server"
import type { AppConfig } from "../config"
import type { AppServices } from "../services"

export type ApiModule = {
  name: string
  register: (app: Application) => void
}

export function registerRoutes(app: Application, config: AppConfig, services: AppServices): void {
  const apiV1Router = createRouter()

  const modules: ApiModule[] = [createJobsModule({ jobs: services.domains.jobs, config })]

  for (const m of modules) {
    m.register(apiV1Router)
  }

  app.route(API_PREFIX, apiV1Router)
  app.get("/", (c) => c.text(`Welcome to ${config.logging.serviceName} API`))
}

export type RegisterRoutesFn = typeof registerRoutes
