import type { ErrorKind } from "./error-kind"

/**
 * Side-channel diagnostic data attached to a ResultError.
 */
export type ErrorMetadata = Readonly<Record<string, unknown>>

/**
 * Read-only shape of one domain failure.
 *
 * @remarks
 * This is data, not a throwable. It travels inside a failed `ResultOrErrors`
 * until a caller chooses to inspect it.
 */
export interface ResultErrorShape {
  /** Stable identifier such as `"User.Name"`. Opaque to this package. */
  readonly code: string

  /** Human-readable message. */
  readonly description: string

  readonly kind: ErrorKind

  /**
   * Numeric tag of the kind: the fixed value for built-in kinds, the caller's
   * sub-tag for `custom`.
   */
  readonly numericKind: number

  readonly metadata?: ErrorMetadata
}
