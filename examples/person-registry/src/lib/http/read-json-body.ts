import { ResultError, ResultOrErrors } from "@outcome/result"
import type { Context } from "hono"
import { issuesToErrors, type SafeParseSchema } from "../validation/issues-to-errors"

/**
 * Reads and validates a JSON request body.
 *
 * Malformed JSON and schema issues come back as `Request.*` validation errors
 * rather than thrown exceptions.
 */
export async function readJsonBody<T>(
  c: Context,
  schema: SafeParseSchema<T>,
): Promise<ResultOrErrors<T>> {
  let raw: unknown

  try {
    raw = await c.req.json()
  } catch {
    return ResultOrErrors.fail<T>(
      ResultError.validation("Request.Body", "Request body must be valid JSON"),
    )
  }

  const parsed = schema.safeParse(raw)

  if (!parsed.success) {
    return ResultOrErrors.failAll<T>(issuesToErrors("Request", parsed.error.issues))
  }

  return ResultOrErrors.ok(parsed.data)
}
