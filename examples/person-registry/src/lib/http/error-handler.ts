import { toAppError } from "@outcome/errors"
import type { Logger } from "@outcome/logger"
import type { ErrorHandler } from "hono"

export type InternalErrorBody = {
  error: { code: "internal_error"; message: string }
}

/**
 * Last-resort handler for thrown errors.
 *
 * Expected failures never reach it: they travel as results. What lands here is
 * a bug (e.g. reading `value` of a failed result), so it is logged with `err`
 * and answered with a generic 500.
 */
export function createErrorHandler(logger: Logger): ErrorHandler {
  return (err, c) => {
    const appError = toAppError(err, "internal_error")
    const meta = { method: c.req.method, path: c.req.path, status: 500, err: appError }

    if (appError.isOperational) {
      logger.warn("Request failed", meta)
    } else {
      logger.error("Request failed", meta)
    }

    const body: InternalErrorBody = {
      error: { code: "internal_error", message: "An unexpected error occurred" },
    }

    return c.json(body, 500)
  }
}
