export type Permission = "user" | "admin"

/** Caller identity as resolved by the authentication layer in front of the service. */
export type RequestIdentity =
  | { kind: "anonymous" }
  | { kind: "user"; userId: string; permission: Permission }

export const anonymous: RequestIdentity = { kind: "anonymous" }

export function isAdmin(identity: RequestIdentity): boolean {
  return identity.kind === "user" && identity.permission === "admin"
}

export function userIdOf(identity: RequestIdentity): string | undefined {
  return identity.kind === "user" ? identity.userId : undefined
}
