import { createApp } from "../../../../lib/server"
import { identityMiddleware } from "../identity.middleware"

function buildApp() {
  const app = createApp()

  app.use("*", identityMiddleware({ userHeader: "x-user-id", rolesHeader: "x-user-roles", adminRole: "admin" }))
  app.get("/", (c) => c.json(c.get("identity")))

  return app
}

describe("identityMiddleware", () => {
  it("treats requests without a user as anonymous", async () => {
    const res = await buildApp().request("/", { headers: { "x-user-id": "  " } })

    expect(await res.json()).toStrictEqual({ kind: "anonymous" })
  })

  it("reads the user and grants admin from the roles header", async () => {
    const res = await buildApp().request("/", { headers: { "x-user-id": "alice", "x-user-roles": "reader, admin" } })

    expect(await res.json()).toStrictEqual({ kind: "user", userId: "alice", permission: "admin" })
  })

  it("defaults to a regular user", async () => {
    const res = await buildApp().request("/", { headers: { "x-user-id": "bob", "x-user-roles": "administrator" } })

    expect(await res.json()).toStrictEqual({ kind: "user", userId: "bob", permission: "user" })
  })
})
