import { BaseError } from "./base-error"

type SchemaIssue = {
  path: readonly PropertyKey[]
  message: string
}

type SchemaError = {
  issues: readonly SchemaIssue[]
}

export type ValidationIssue = { path: string; message: string }

function formatPath(path: readonly PropertyKey[]): string {
  let out = ""

  for (const part of path) {
    if (typeof part === "number") out += `[${part}]`
    else out += out ? `.${String(part)}` : String(part)
  }

  return out
}

export class ValidationError extends BaseError<"validation_error"> {
  static fromSchemaError(err: SchemaError): ValidationError {
    const issues: ValidationIssue[] = err.issues.map((issue) => ({
      path: formatPath(issue.path),
      message: issue.message,
    }))

    return new ValidationError(issues[0]?.message ?? "Invalid input", {
      code: "validation_error",
      context: { issues },
    })
  }
}

function isSchemaError(err: unknown): err is SchemaError {
  if (typeof err !== "object" || err === null || !("issues" in err)) return false

  const { issues } = err
  if (!Array.isArray(issues)) return false

  return issues.every(
    (issue: unknown) =>
      typeof issue === "object" &&
      issue !== null &&
      "path" in issue &&
      Array.isArray(issue.path) &&
      "message" in issue &&
      typeof issue.message === "string",
  )
}

/** Runs `schema.parse` and rethrows schema failures as `ValidationError`. */
export function parseOrThrow<T>(schema: { parse: (data: unknown) => T }, data: unknown): T {
  try {
    return schema.parse(data)
  } catch (err) {
    if (isSchemaError(err)) {
      throw ValidationError.fromSchemaError(err)
    }
    throw err
  }
}

export function isValidationError(err: unknown): err is ValidationError {
  return err instanceof ValidationError
}
