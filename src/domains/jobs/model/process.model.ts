import { BaseError } from "../../../lib/errors"

export type JobControlOption = "sync-execute" | "async-execute"
export type Visibility = "public" | "private"

export type ProcessDescription = {
  id: string
  /** Set for processes hosted by a remote provider. */
  providerId?: string
  title?: string
  jobControlOptions: JobControlOption[]
  visibility: Visibility
  isWorkflow: boolean
}

export type ProviderDescription = {
  id: string
  title?: string
  public: boolean
}

export interface ProcessCatalog {
  getProcess(processId: string, providerId?: string): Promise<ProcessDescription | undefined>
  getProvider(providerId: string): Promise<ProviderDescription | undefined>
}

export type ProcessErrorCode = "process_not_found" | "provider_not_found" | "process_forbidden"

export class ProcessError extends BaseError<ProcessErrorCode> {
  static processNotFound(processId: string, providerId?: string): ProcessError {
    return new ProcessError(`Process ${processId} could not be found`, {
      code: "process_not_found",
      context: { processId, ...(providerId !== undefined && { providerId }) },
    })
  }

  static providerNotFound(providerId: string): ProcessError {
    return new ProcessError(`Provider ${providerId} could not be found`, {
      code: "provider_not_found",
      context: { providerId },
    })
  }

  static providerForbidden(providerId: string): ProcessError {
    return new ProcessError(`Access to provider ${providerId} is not permitted`, {
      code: "process_forbidden",
      context: { providerId },
    })
  }

  static forbidden(processId: string): ProcessError {
    return new ProcessError(`Access to process ${processId} is not permitted`, {
      code: "process_forbidden",
      context: { processId },
    })
  }
}
