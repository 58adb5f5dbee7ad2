import { FakeClock } from "../../../../lib/clock"
import type { Application } from "../../../../lib/server"
import { createTestHarness, TEST_RUNNER_TOKEN, type TestHarness } from "../../../../tests/test-harness"
import type { JobStatusBody } from "../job.presenter"

const T0 = new Date("2026-02-01T00:00:00Z")
const BASE = "http://jobs.test/api/v1"

type RequestHeaders = Record<string, string>

const alice: RequestHeaders = { "x-user-id": "alice" }
const bob: RequestHeaders = { "x-user-id": "bob" }
const admin: RequestHeaders = { "x-user-id": "root", "x-user-roles": "reader, admin" }

type ApiResponse<T> = {
  status: number
  headers: Headers
  body: T
}

type ErrorBody = {
  error: { status: number; code: string; message: string; requestId: string; detail?: string; [key: string]: unknown }
}

type ListingBody = {
  jobs: (string | JobStatusBody)[]
  page: number
  limit: number
  total: number
  count: number
  links: { href: string; rel: string }[]
}

describe("Jobs API", () => {
  let harness: TestHarness
  let app: Application
  let clock: FakeClock

  beforeEach(async () => {
    clock = new FakeClock(T0)
    harness = await createTestHarness({ coreOverrides: { clock } })
    await harness.lifecycle.start()
    app = harness.app
  })

  afterEach(async () => {
    await harness.lifecycle.stop()
  })

  const send = async <T>(
    method: string,
    path: string,
    opts: { headers?: RequestHeaders; body?: unknown } = {},
  ): Promise<ApiResponse<T>> => {
    const res = await app.request(`/api/v1${path}`, {
      method,
      headers: { "Content-Type": "application/json", ...opts.headers },
      ...(opts.body !== undefined && { body: JSON.stringify(opts.body) }),
    })
    return { status: res.status, headers: res.headers, body: await (res.json() as Promise<T>) }
  }

  const submit = async (
    processPath: string,
    opts: { headers?: RequestHeaders; prefer?: string; body?: Record<string, unknown> } = {},
  ) => {
    const res = await send<JobStatusBody>("POST", `${processPath}/execution`, {
      headers: { ...opts.headers, ...(opts.prefer !== undefined && { Prefer: opts.prefer }) },
      body: opts.body ?? { inputs: {} },
    })
    clock.advance(1000)
    return res
  }

  const submitAsync = async (processPath: string, headers: RequestHeaders, access?: "public" | "private") => {
    const res = await submit(processPath, {
      headers,
      prefer: "respond-async",
      body: { inputs: {}, ...(access !== undefined && { access }) },
    })
    expect(res.status).toBe(201)
    return res.body.jobID
  }

  const report = (jobId: string, body: Record<string, unknown>, token: string | undefined = TEST_RUNNER_TOKEN) =>
    send<JobStatusBody>("POST", `/jobs/${jobId}/reports`, {
      headers: { ...(token !== undefined && { "x-runner-token": token }) },
      body,
    })

  it("greets on the root path", async () => {
    const res = await app.request("/")

    expect(await res.text()).toBe("Welcome to Process Jobs Service API")
  })

  describe("execution", () => {
    it("accepts async executions with a location", async () => {
      const res = await submit("/processes/ndvi", { headers: alice, body: { inputs: { scene: "S2A" } } })
      const jobId = res.body.jobID

      expect(res.status).toBe(201)
      expect(res.headers.get("location")).toBe(`${BASE}/jobs/${jobId}`)
      expect(res.headers.get("preference-applied")).toBeNull()
      expect(res.body).toEqual({
        jobID: jobId,
        processID: "ndvi",
        type: "process",
        status: "accepted",
        message: "Job accepted for execution.",
        created: "2026-02-01T00:00:00.000Z",
        updated: "2026-02-01T00:00:00.000Z",
        duration: "00:00:00",
        runningSeconds: 0,
        percentCompleted: 0,
        progress: 0,
        links: [
          { href: `${BASE}/jobs/${jobId}`, rel: "self", type: "application/json", title: "Job status." },
          {
            href: `${BASE}/processes/ndvi`,
            rel: "up",
            type: "application/json",
            title: "Process that created the job.",
          },
          { href: `${BASE}/jobs/${jobId}/logs`, rel: "logs", type: "application/json", title: "Job execution logs." },
        ],
      })
    })

    it("echoes an honoured respond-async preference", async () => {
      const res = await submit("/processes/echo", { prefer: "respond-async" })

      expect(res.status).toBe(201)
      expect(res.headers.get("preference-applied")).toBe("respond-async")
    })

    it("falls back to an async answer when a sync execution does not finish in time", async () => {
      const res = await submit("/processes/echo")

      expect(res.status).toBe(201)
      expect(res.headers.get("preference-applied")).toBeNull()
      expect(clock.sleeps).toHaveLength(20)
    })

    it("runs remote processes under their provider", async () => {
      const res = await submit("/providers/remote-eo/processes/sentinel-mosaic", { prefer: "respond-async" })

      expect(res.status).toBe(201)
      expect(res.body.providerID).toBe("remote-eo")
      expect(res.body.links[1]?.href).toBe(`${BASE}/providers/remote-eo/processes/sentinel-mosaic`)
    })

    it("rejects a malformed preference", async () => {
      const res = await submit("/processes/echo", { prefer: "wait=abc" })

      expect(res.status).toBe(400)
      expect(res.body).toMatchObject({ error: { code: "invalid_preference", status: 400 } })
    })

    it("rejects an invalid body", async () => {
      const bad = await submit("/processes/echo", { body: { inputs: {}, access: "secret" } })
      const res = await app.request("/api/v1/processes/echo/execution", { method: "POST", body: "{not json" })

      expect(bad.status).toBe(400)
      expect(res.status).toBe(400)
    })

    it("answers unknown and hidden processes", async () => {
      expect((await submit("/processes/missing")).status).toBe(404)
      expect((await submit("/processes/restricted")).status).toBe(401)
      expect((await submit("/processes/restricted", { headers: alice })).status).toBe(403)
      expect((await submit("/processes/restricted", { headers: admin, prefer: "respond-async" })).status).toBe(201)
    })
  })

  describe("runner reports", () => {
    it("moves a job through its lifecycle and exposes results", async () => {
      const jobId = await submitAsync("/processes/ndvi", alice)

      const running = await report(jobId, { status: "running", progress: 50 })
      expect(running.status).toBe(200)
      expect(running.body).toMatchObject({ status: "running", progress: 50, started: "2026-02-01T00:00:01.000Z" })

      clock.advance(90_000)
      const done = await report(jobId, {
        status: "succeeded",
        result: { id: "ndvi", href: "http://files.test/ndvi.tif", mediaType: "image/tiff" },
      })
      expect(done.body).toMatchObject({
        status: "succeeded",
        progress: 100,
        duration: "00:01:30",
        finished: "2026-02-01T00:01:31.000Z",
      })

      const results = await send<unknown>("GET", `/jobs/${jobId}/results`, { headers: alice })
      expect(results.body).toEqual({ ndvi: { href: "http://files.test/ndvi.tif", mediaType: "image/tiff" } })

      const outputs = await send<{ outputs: unknown; links: { rel: string }[] }>("GET", `/jobs/${jobId}/outputs`, {
        headers: alice,
      })
      expect(outputs.body.outputs).toEqual(results.body)
      expect(outputs.body.links.map((link) => link.rel)).toEqual(["self", "up", "logs", "results", "outputs"])

      const logs = await send<string[]>("GET", `/jobs/${jobId}/logs`, { headers: alice })
      expect(logs.body.at(-1)).toBe(
        "[2026-02-01 00:01:31] INFO     [job] 00:01:30  50% succeeded  Job status changed to succeeded.",
      )
    })

    it("exposes exceptions of failed jobs", async () => {
      const jobId = await submitAsync("/processes/ndvi", alice, "public")
      await report(jobId, { status: "failed", exception: { code: "NoData", message: "Scene has no pixels" } })

      const exceptions = await send<unknown>("GET", `/jobs/${jobId}/exceptions`)
      const results = await send<ErrorBody>("GET", `/jobs/${jobId}/results`)

      expect(exceptions.body).toEqual([{ code: "NoData", message: "Scene has no pixels" }])
      expect(results.status).toBe(400)
      expect(results.body.error.code).toBe("job_results_failed")
    })

    it("requires the runner token", async () => {
      const jobId = await submitAsync("/processes/ndvi", alice)

      const missing = await report(jobId, { status: "running" }, undefined)
      const wrong = await report(jobId, { status: "running" }, "not-the-token")

      expect(missing.status).toBe(401)
      expect(wrong.status).toBe(401)
      expect(wrong.body).toMatchObject({ error: { code: "runner_unauthorized" } })
    })

    it("rejects backward transitions and out of range progress", async () => {
      const jobId = await submitAsync("/processes/ndvi", alice)
      await report(jobId, { status: "succeeded" })

      expect((await report(jobId, { status: "running" })).status).toBe(409)
      expect((await report(jobId, { progress: 120 })).status).toBe(422)
    })
  })

  describe("single job", () => {
    it("hides private jobs from other callers", async () => {
      const jobId = await submitAsync("/processes/ndvi", alice)

      const anonymous = await send<ErrorBody>("GET", `/jobs/${jobId}`)
      const other = await send<ErrorBody>("GET", `/jobs/${jobId}`, { headers: bob })

      expect(anonymous.status).toBe(401)
      expect(anonymous.body.error.code).toBe("authentication_required")
      expect(other.status).toBe(403)
      expect(other.body.error.code).toBe("job_forbidden")
      expect((await send("GET", `/jobs/${jobId}`, { headers: alice })).status).toBe(200)
      expect((await send("GET", `/jobs/${jobId}`, { headers: admin })).status).toBe(200)
    })

    it("reports malformed ids as unknown jobs", async () => {
      const res = await send<ErrorBody>("GET", "/jobs/not-a-uuid", { headers: { "x-request-id": "req-1" } })

      expect(res.status).toBe(404)
      expect(res.body).toEqual({
        error: {
          detail: "Job not-a-uuid could not be found",
          jobId: "not-a-uuid",
          code: "job_not_found",
          status: 404,
          message: "Job not found",
          requestId: "req-1",
        },
      })
    })

    it("checks that a scoped path matches the job", async () => {
      const jobId = await submitAsync("/processes/ndvi", alice)

      expect((await send("GET", `/processes/ndvi/jobs/${jobId}`, { headers: alice })).status).toBe(200)
      expect((await send("GET", `/processes/echo/jobs/${jobId}`, { headers: alice })).status).toBe(404)
    })

    it("reports results that are not ready yet", async () => {
      const jobId = await submitAsync("/processes/ndvi", alice)

      const res = await send<ErrorBody>("GET", `/jobs/${jobId}/results`, { headers: alice })

      expect(res.status).toBe(404)
      expect(res.body.error.code).toBe("job_results_not_ready")
    })
  })

  describe("dismissal", () => {
    it("dismisses a pending job for its owner", async () => {
      const jobId = await submitAsync("/processes/ndvi", alice, "public")

      const forbidden = await send<ErrorBody>("DELETE", `/jobs/${jobId}`, { headers: bob })
      const dismissed = await send<JobStatusBody>("DELETE", `/jobs/${jobId}`, { headers: alice })
      const results = await send<ErrorBody>("GET", `/jobs/${jobId}/results`, { headers: alice })

      expect(forbidden.status).toBe(403)
      expect(dismissed.status).toBe(200)
      expect(dismissed.body).toMatchObject({ status: "dismissed", message: "Job dismissed." })
      expect(results.status).toBe(410)
      expect(results.body.error.code).toBe("job_gone")
    })

    it("keeps a finished job but marks its results gone", async () => {
      const jobId = await submitAsync("/processes/ndvi", alice)
      await report(jobId, { status: "succeeded", result: { id: "ndvi", value: 0.4 } })

      const dismissed = await send<JobStatusBody>("DELETE", `/jobs/${jobId}`, { headers: alice })
      const results = await send<ErrorBody>("GET", `/jobs/${jobId}/results`, { headers: alice })
      const outputs = await send<ErrorBody>("GET", `/jobs/${jobId}/outputs`, { headers: alice })
      const logs = await send<string[]>("GET", `/jobs/${jobId}/logs`, { headers: alice })

      expect(dismissed.status).toBe(200)
      expect(dismissed.body.status).toBe("succeeded")
      expect(dismissed.body.links.map((link) => link.rel)).toEqual(["self", "up", "logs"])
      expect(results.status).toBe(410)
      expect(results.body.error.code).toBe("job_gone")
      expect(outputs.status).toBe(410)
      expect(logs.body.at(-1)).toMatch(/Job results dismissed\.$/)
    })

    it("dismisses a batch only when every job may be dismissed", async () => {
      const first = await submitAsync("/processes/ndvi", alice)
      const second = await submitAsync("/processes/echo", alice)
      const foreign = await submitAsync("/processes/echo", bob, "public")

      const refused = await send<ErrorBody>("DELETE", "/jobs", { headers: alice, body: { jobs: [first, foreign] } })
      const pending = await send<JobStatusBody>("GET", `/jobs/${first}`, { headers: alice })
      const accepted = await send<{ jobs: string[] }>("DELETE", "/jobs", {
        headers: alice,
        body: { jobs: [first, second, first] },
      })

      expect(refused.status).toBe(403)
      expect(pending.body.status).toBe("accepted")
      expect(accepted.status).toBe(200)
      expect(accepted.body).toEqual({ jobs: [first, second] })
    })
  })

  describe("listing", () => {
    let publicByAlice: string
    let privateByAlice: string
    let publicByBob: string

    beforeEach(async () => {
      publicByAlice = await submitAsync("/processes/ndvi", alice, "public")
      privateByAlice = await submitAsync("/processes/ndvi", alice, "private")
      publicByBob = await submitAsync("/processes/echo", bob, "public")
    })

    it("lists public jobs for anonymous callers", async () => {
      const res = await send<ListingBody>("GET", "/jobs")

      expect(res.status).toBe(200)
      expect(res.body).toMatchObject({
        jobs: [publicByBob, publicByAlice],
        page: 0,
        limit: 10,
        total: 2,
        count: 2,
      })
      expect(res.body.links[0]).toEqual({
        href: `${BASE}/jobs?limit=10&page=0`,
        rel: "self",
        type: "application/json",
        title: "Current page of job results.",
      })
    })

    it("lists a user's own jobs", async () => {
      const res = await send<ListingBody>("GET", "/jobs", { headers: alice })

      expect(res.body.jobs).toEqual([privateByAlice, publicByAlice])
    })

    it("lets admins filter by access", async () => {
      const res = await send<ListingBody>("GET", "/jobs?access=private", { headers: admin })

      expect(res.body.jobs).toEqual([privateByAlice])
    })

    it("returns job details on request", async () => {
      const res = await send<ListingBody>("GET", "/jobs?detail=true&limit=1")

      expect(res.body.jobs).toHaveLength(1)
      expect(res.body.jobs[0]).toMatchObject({ jobID: publicByBob, processID: "echo", status: "accepted" })
      expect(res.body.links.find((link) => link.rel === "next")?.href).toBe(`${BASE}/jobs?detail=true&limit=1&page=1`)
    })

    it("reads unrecognised detail values as false", async () => {
      const unknown = await send<ListingBody>("GET", "/jobs?detail=maybe")
      const empty = await send<ListingBody>("GET", "/jobs?detail=")
      const shouted = await send<ListingBody>("GET", "/jobs?detail=YES&limit=1")

      expect(unknown.status).toBe(200)
      expect(unknown.body.jobs).toEqual([publicByBob, publicByAlice])
      expect(empty.body.jobs).toEqual([publicByBob, publicByAlice])
      expect(shouted.body.jobs[0]).toMatchObject({ jobID: publicByBob })
    })

    it("scopes listings to a process and links to the global collection", async () => {
      const res = await send<ListingBody>("GET", "/processes/ndvi/jobs?limit=1&page=0", { headers: alice })

      expect(res.body.jobs).toEqual([privateByAlice])
      expect(res.body.total).toBe(2)
      expect(res.body.links.find((link) => link.rel === "alternate")?.href).toBe(
        `${BASE}/jobs?process=ndvi&limit=1&page=0`,
      )
    })

    it("groups jobs", async () => {
      const res = await send<unknown>("GET", "/jobs?groups=process", { headers: admin })

      expect(res.body).toMatchObject({
        groups: [
          { category: { process: "echo" }, jobs: [publicByBob], count: 1 },
          { category: { process: "ndvi" }, jobs: [privateByAlice, publicByAlice], count: 2 },
        ],
        total: 3,
        count: 2,
      })
    })

    it("filters on the notification contact", async () => {
      await submit("/processes/ndvi", {
        headers: bob,
        prefer: "respond-async",
        body: { inputs: {}, notification_email: "bob@example.org" },
      })

      const res = await send<ListingBody>("GET", "/jobs?notification_email=BOB@example.org", { headers: bob })

      expect(res.body.total).toBe(1)
    })

    it.each([
      ["/jobs?limit=1001", 400, "validation_error"],
      ["/jobs?page=-1", 400, "validation_error"],
      ["/jobs?status=bogus", 422, "invalid_job_filter"],
      ["/jobs?datetime=yesterday", 422, "invalid_job_filter"],
      ["/processes/ndvi/jobs?process=echo", 400, "job_scope_mismatch"],
      ["/processes/missing/jobs", 404, "process_not_found"],
      ["/providers/unknown/jobs", 404, "provider_not_found"],
      ["/providers/partner-lab/jobs", 401, "authentication_required"],
    ])("answers %s with %i", async (path, status, code) => {
      const res = await send<ErrorBody>("GET", path)

      expect(res.status).toBe(status)
      expect(res.body.error.code).toBe(code)
    })

    it("forbids private providers to regular users", async () => {
      const res = await send<ErrorBody>("GET", "/providers/partner-lab/jobs", { headers: alice })

      expect(res.status).toBe(403)
      expect(res.body.error.code).toBe("process_forbidden")
    })
  })
})
