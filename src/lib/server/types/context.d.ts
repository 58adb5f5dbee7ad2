import type { Logger } from "../../logger"

export type ServerContextVariables = {
  requestId: string
  logger: Logger
}

declare module "hono" {
  // eslint-disable-next-line @typescript-eslint/no-empty-object-type
  interface ContextVariableMap extends ServerContextVariables {}
}
