import fs from "node:fs/promises"
import os from "node:os"
import path from "node:path"
import { z } from "zod/mini"
import { DotenvSource } from "../dotenv-source"
import { EnvSource } from "../env-source"
import { loadConfig } from "../load-config"
import type { ConfigSource } from "../source"

const schema = z.object({
  PORT: z._default(z.coerce.number(), 3000),
  HOST: z.string(),
})

function source(name: string, values: Record<string, unknown>): ConfigSource {
  return { name, load: async () => values }
}

describe("loadConfig", () => {
  it("lets later sources win", async () => {
    const config = await loadConfig({
      schema,
      sources: [source("a", { HOST: "a.local", PORT: "1" }), source("b", { HOST: "b.local" })],
    })

    expect(config).toStrictEqual({ HOST: "b.local", PORT: 1 })
  })

  it("ignores undefined values from later sources", async () => {
    const config = await loadConfig({
      schema,
      sources: [source("a", { HOST: "a.local" }), source("b", { HOST: undefined })],
    })

    expect(config.HOST).toBe("a.local")
  })

  it("fails with invalid_config when validation fails", async () => {
    await expect(loadConfig({ schema, sources: [source("a", {})] })).rejects.toMatchObject({
      code: "invalid_config",
      isOperational: false,
    })
  })
})

describe("EnvSource", () => {
  it("strips the prefix and drops other keys", async () => {
    const env = new EnvSource({ prefix: "JOBS_", env: { JOBS_STORE: "redis", HOME: "/root" } })

    expect(await env.load()).toStrictEqual({ STORE: "redis" })
  })
})

describe("DotenvSource", () => {
  let cwd: string

  beforeEach(async () => {
    cwd = await fs.mkdtemp(path.join(os.tmpdir(), "dotenv-test-"))
  })

  afterEach(async () => {
    await fs.rm(cwd, { recursive: true })
  })

  it("parses the file relative to cwd", async () => {
    await fs.writeFile(path.join(cwd, ".env.test"), "# comment\nPORT=4000\nHOST='jobs.local'")

    const dotenv = new DotenvSource({ file: ".env.test", required: true, cwd })

    expect(await dotenv.load()).toStrictEqual({ PORT: "4000", HOST: "jobs.local" })
  })

  it("yields nothing for a missing optional file", async () => {
    const dotenv = new DotenvSource({ file: ".env.missing", required: false, cwd })

    expect(await dotenv.load()).toStrictEqual({})
  })

  it("rejects a missing required file", async () => {
    const dotenv = new DotenvSource({ file: ".env.missing", required: true, cwd })

    await expect(dotenv.load()).rejects.toMatchObject({ code: "ENOENT" })
  })
})
