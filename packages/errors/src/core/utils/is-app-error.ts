import type { AppError } from "../../ports/error"

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null
}

/**
 * Type guard to check if a value is an AppError.
 *
 * @example
 * ```ts
 * try {
 *   result.value
 * } catch (err) {
 *   if (isAppError(err) && !err.isOperational) {
 *     logger.error("Result misuse", { err })
 *   }
 * }
 * ```
 */
export function isAppError(e: unknown): e is AppError {
  if (!isRecord(e)) return false

  return (
    typeof e.code === "string" &&
    isRecord(e.context) &&
    typeof e.isOperational === "boolean" &&
    typeof e.message === "string" &&
    typeof e.name === "string"
  )
}
