import type { NonEmptyReadonlyArray, ResultError } from "@outcome/result"
import type { Context } from "hono"
import { toErrorResponse } from "../../../lib/http/error-response"

export function respondWithErrors(c: Context, errors: NonEmptyReadonlyArray<ResultError>) {
  const response = toErrorResponse(errors)
  return c.json(response.body, response.status)
}
