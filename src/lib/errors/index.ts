export type { AppError, ErrorCode, ErrorContext, SerializedError } from "./app-error"
export { BaseError, type BaseErrorOptions, serializeError } from "./base-error"
export { isAppError } from "./is-app-error"
export {
  isValidationError,
  parseOrThrow,
  ValidationError,
  type ValidationIssue,
} from "./validation-error"
