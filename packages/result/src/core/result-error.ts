import {
  type BuiltInErrorKind,
  type ErrorKind,
  ErrorKindCodes,
  type ErrorKindInput,
  isBuiltInErrorKind,
} from "../ports/error-kind"
import type { ErrorMetadata, ResultErrorShape } from "../ports/result-error"

export type CreateResultErrorInput = Readonly<{
  kind: ErrorKindInput
  code: string
  description: string
  metadata?: ErrorMetadata
}>

const DEFAULTS: Record<BuiltInErrorKind, Readonly<{ code: string; description: string }>> = {
  failure: { code: "General.Failure", description: "A failure has occurred." },
  unexpected: { code: "General.Unexpected", description: "An unexpected error has occurred." },
  validation: { code: "General.Validation", description: "A validation error has occurred." },
  conflict: { code: "General.Conflict", description: "A conflict error has occurred." },
  not_found: { code: "General.NotFound", description: "A 'Not Found' error has occurred." },
  unauthorized: {
    code: "General.Unauthorized",
    description: "An 'Unauthorized' error has occurred.",
  },
  forbidden: { code: "General.Forbidden", description: "A 'Forbidden' error has occurred." },
}

/**
 * An immutable description of one expected failure.
 *
 * Build instances through the per-kind factories:
 *
 * @example
 * ```ts
 * const error = ResultError.validation("User.Name", "Name is too short", { minLength: 3 })
 * error.kind        // "validation"
 * error.numericKind // 2
 * ```
 */
export class ResultError implements ResultErrorShape {
  readonly code: string
  readonly description: string
  readonly kind: ErrorKind
  readonly numericKind: number
  declare readonly metadata?: ErrorMetadata

  private constructor(
    kind: ErrorKind,
    numericKind: number,
    code: string,
    description: string,
    metadata?: ErrorMetadata,
  ) {
    this.kind = kind
    this.numericKind = numericKind
    this.code = code
    this.description = description

    if (metadata !== undefined) {
      this.metadata = Object.freeze({ ...metadata })
    }

    Object.freeze(this)
  }

  static failure(
    code: string = DEFAULTS.failure.code,
    description: string = DEFAULTS.failure.description,
    metadata?: ErrorMetadata,
  ): ResultError {
    return ResultError.builtIn("failure", code, description, metadata)
  }

  static unexpected(
    code: string = DEFAULTS.unexpected.code,
    description: string = DEFAULTS.unexpected.description,
    metadata?: ErrorMetadata,
  ): ResultError {
    return ResultError.builtIn("unexpected", code, description, metadata)
  }

  static validation(
    code: string = DEFAULTS.validation.code,
    description: string = DEFAULTS.validation.description,
    metadata?: ErrorMetadata,
  ): ResultError {
    return ResultError.builtIn("validation", code, description, metadata)
  }

  static conflict(
    code: string = DEFAULTS.conflict.code,
    description: string = DEFAULTS.conflict.description,
    metadata?: ErrorMetadata,
  ): ResultError {
    return ResultError.builtIn("conflict", code, description, metadata)
  }

  static notFound(
    code: string = DEFAULTS.not_found.code,
    description: string = DEFAULTS.not_found.description,
    metadata?: ErrorMetadata,
  ): ResultError {
    return ResultError.builtIn("not_found", code, description, metadata)
  }

  static unauthorized(
    code: string = DEFAULTS.unauthorized.code,
    description: string = DEFAULTS.unauthorized.description,
    metadata?: ErrorMetadata,
  ): ResultError {
    return ResultError.builtIn("unauthorized", code, description, metadata)
  }

  static forbidden(
    code: string = DEFAULTS.forbidden.code,
    description: string = DEFAULTS.forbidden.description,
    metadata?: ErrorMetadata,
  ): ResultError {
    return ResultError.builtIn("forbidden", code, description, metadata)
  }

  /**
   * Creates an error of a domain-specific kind outside the fixed set.
   *
   * @param numericKind - Caller-defined tag, reported back as `numericKind`.
   */
  static custom(
    numericKind: number,
    code: string,
    description: string,
    metadata?: ErrorMetadata,
  ): ResultError {
    return new ResultError("custom", numericKind, code, description, metadata)
  }

  static create(input: CreateResultErrorInput): ResultError {
    const { kind, code, description, metadata } = input

    if (isBuiltInErrorKind(kind)) {
      return ResultError.builtIn(kind, code, description, metadata)
    }

    return ResultError.custom(kind.custom, code, description, metadata)
  }

  private static builtIn(
    kind: BuiltInErrorKind,
    code: string,
    description: string,
    metadata?: ErrorMetadata,
  ): ResultError {
    return new ResultError(kind, ErrorKindCodes[kind], code, description, metadata)
  }

  /** Structural equality over every field. */
  equals(other: ResultErrorShape): boolean {
    return (
      this.kind === other.kind &&
      this.numericKind === other.numericKind &&
      this.code === other.code &&
      this.description === other.description &&
      metadataEquals(this.metadata, other.metadata)
    )
  }
}

export function isResultError(value: unknown): value is ResultError {
  return value instanceof ResultError
}

function metadataEquals(a?: ErrorMetadata, b?: ErrorMetadata): boolean {
  if (a === b) return true
  if (a === undefined || b === undefined) return false

  const keys = Object.keys(a)
  if (keys.length !== Object.keys(b).length) return false

  return keys.every((key) => Object.hasOwn(b, key) && Object.is(a[key], b[key]))
}
