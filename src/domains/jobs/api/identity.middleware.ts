import type { Context, Middleware } from "../../../lib/server"
import { anonymous, type RequestIdentity } from "../model/identity.model"

export type IdentityHeaders = {
  userHeader: string
  rolesHeader: string
  adminRole: string
}

/** Reads the caller identity forwarded by the authenticating gateway. */
export function resolveIdentity(c: Context, headers: IdentityHeaders): RequestIdentity {
  const userId = c.req.header(headers.userHeader)?.trim()
  if (!userId) return anonymous

  const roles = (c.req.header(headers.rolesHeader) ?? "")
    .split(",")
    .map((role) => role.trim())

  return { kind: "user", userId, permission: roles.includes(headers.adminRole) ? "admin" : "user" }
}

export function identityMiddleware(headers: IdentityHeaders): Middleware {
  return async (c, next) => {
    c.set("identity", resolveIdentity(c, headers))
    await next()
  }
}
