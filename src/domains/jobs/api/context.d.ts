import type { RequestIdentity } from "../model/identity.model"

declare module "hono" {
  interface ContextVariableMap {
    identity: RequestIdentity
  }
}
