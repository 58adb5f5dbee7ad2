import { BaseError } from "../../../errors"
import { createErrorFormatter, type ErrorMappingsConfig } from "../error-formatter"

const mappings: ErrorMappingsConfig["mappings"] = {
  job_not_found: { status: 404, message: "Job not found" },
}

describe("createErrorFormatter", () => {
  it("maps known codes to their status and message", () => {
    const format = createErrorFormatter({ mappings })
    const err = new BaseError("Job j-1 could not be found", { code: "job_not_found", context: { jobId: "j-1" } })

    expect(format(err, "req-1")).toStrictEqual({
      error: { code: "job_not_found", status: 404, message: "Job not found", requestId: "req-1" },
    })
  })

  it("merges transformed context into the body", () => {
    const format = createErrorFormatter({
      mappings,
      transformContext: (error) => ({ detail: error.message, ...error.context }),
    })
    const err = new BaseError("Job j-1 could not be found", { code: "job_not_found", context: { jobId: "j-1" } })

    expect(format(err, "req-1").error).toStrictEqual({
      detail: "Job j-1 could not be found",
      jobId: "j-1",
      code: "job_not_found",
      status: 404,
      message: "Job not found",
      requestId: "req-1",
    })
  })

  it("keeps the code of unmapped app errors with the fallback status", () => {
    const format = createErrorFormatter({ mappings })

    expect(format(new BaseError("Odd", { code: "odd_failure" }), "req-2").error).toStrictEqual({
      code: "odd_failure",
      status: 500,
      message: "An unexpected error occurred",
      requestId: "req-2",
    })
  })

  it("hides unknown errors behind the fallback", () => {
    const format = createErrorFormatter({
      mappings,
      fallback: { code: "internal_error", status: 503, message: "Try again later" },
    })

    expect(format(new Error("socket hang up"), "req-3").error).toStrictEqual({
      code: "internal_error",
      status: 503,
      message: "Try again later",
      requestId: "req-3",
    })
  })

  it("ignores a throwing context transformer", () => {
    const format = createErrorFormatter({
      mappings,
      transformContext: () => {
        throw new Error("transform failed")
      },
    })

    expect(format(new BaseError("Missing", { code: "job_not_found" }), "req-4").error.code).toBe("job_not_found")
  })
})
