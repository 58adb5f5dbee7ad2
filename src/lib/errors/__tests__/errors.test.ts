import { z } from "zod/mini"
import { BaseError, isAppError, parseOrThrow, serializeError, ValidationError } from ".."

describe("BaseError", () => {
  it("defaults to an operational, non-retryable error", () => {
    const err = new BaseError("Job missing", { code: "job_not_found", context: { jobId: "j-1" } })

    expect(err).toMatchObject({
      name: "BaseError",
      code: "job_not_found",
      context: { jobId: "j-1" },
      isRetryable: false,
      isOperational: true,
    })
    expect(isAppError(err)).toBe(true)
  })

  it("serializes nested causes", () => {
    const err = new BaseError("Outer", { code: "outer", cause: new Error("inner") })

    expect(serializeError(err)).toMatchObject({
      code: "outer",
      message: "Outer",
      cause: { name: "Error", code: "unknown", message: "inner", isOperational: false },
    })
  })

  it("serializes thrown non-errors", () => {
    expect(serializeError("boom")).toMatchObject({ name: "NonErrorThrown", message: "boom", context: { value: "boom" } })
  })
})

describe("isAppError", () => {
  it("rejects plain errors and objects", () => {
    expect(isAppError(new Error("plain"))).toBe(false)
    expect(isAppError({ code: "x", context: {} })).toBe(false)
  })
})

describe("parseOrThrow", () => {
  const schema = z.object({ jobs: z.array(z.string()) })

  it("returns parsed data", () => {
    expect(parseOrThrow(schema, { jobs: ["a"] })).toStrictEqual({ jobs: ["a"] })
  })

  it("rethrows schema failures as ValidationError with issue paths", () => {
    let caught: unknown

    try {
      parseOrThrow(schema, { jobs: ["a", 2] })
    } catch (err) {
      caught = err
    }

    expect(caught).toBeInstanceOf(ValidationError)
    expect(caught).toMatchObject({ code: "validation_error", context: { issues: [{ path: "jobs[1]" }] } })
  })

  it("rethrows other errors untouched", () => {
    const boom = new Error("boom")
    const schema = {
      parse: (): never => {
        throw boom
      },
    }

    expect(() => parseOrThrow(schema, {})).toThrow(boom)
  })
})
