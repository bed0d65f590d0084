import type { Logger } from "@outcome/logger"
import type { ErrorKind, ResultOrErrors } from "@outcome/result"

const SEVERE_KINDS: ReadonlySet<ErrorKind> = new Set(["failure", "unexpected"])

/**
 * Centralized outcome logging policy:
 * - success => debug
 * - any failure/unexpected error => error
 * - other failures (validation, not found, ...) => info
 *
 * Returns the result unchanged so it can wrap a call inline.
 */
export function reportOutcome<T>(
  logger: Logger,
  operation: string,
  result: ResultOrErrors<T>,
): ResultOrErrors<T> {
  result.switch(
    () => logger.debug(`${operation} succeeded`, { operation, outcome: "success" }),
    (errors) => {
      const meta = {
        operation,
        outcome: "failure" as const,
        errorCodes: errors.map((e) => e.code),
        errorKinds: errors.map((e) => e.kind),
      }

      if (errors.some((e) => SEVERE_KINDS.has(e.kind))) {
        logger.error(`${operation} failed`, meta)
        return
      }

      logger.info(`${operation} rejected`, meta)
    },
  )

  return result
}
