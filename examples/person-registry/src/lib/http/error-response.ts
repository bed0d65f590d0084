import type { ErrorKind, ErrorMetadata, NonEmptyReadonlyArray, ResultError } from "@outcome/result"

export type ErrorStatus = 400 | 401 | 403 | 404 | 409 | 500

/**
 * HTTP status chosen for a failed result, keyed by the kind of its first error.
 */
export const statusByKind: Record<ErrorKind, ErrorStatus> = {
  validation: 400,
  unauthorized: 401,
  forbidden: 403,
  not_found: 404,
  conflict: 409,
  failure: 500,
  unexpected: 500,
  custom: 500,
}

export type ErrorResponseItem = {
  code: string
  description: string
  kind: ErrorKind
  metadata?: ErrorMetadata
}

export type ErrorResponseBody = {
  errors: ErrorResponseItem[]
}

export type ErrorResponse = {
  status: ErrorStatus
  body: ErrorResponseBody
}

export function toErrorResponse(errors: NonEmptyReadonlyArray<ResultError>): ErrorResponse {
  return {
    status: statusByKind[errors[0].kind],
    body: {
      errors: errors.map((error) => ({
        code: error.code,
        description: error.description,
        kind: error.kind,
        ...(error.metadata && { metadata: error.metadata }),
      })),
    },
  }
}
