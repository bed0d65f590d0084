export type ErrorCode = Lowercase<string>

/**
 * Contextual metadata attached to thrown errors.
 * Use this to carry structured data (accessor names, counts, etc.) without string munging.
 */
export type ErrorContext = Readonly<Record<string, unknown>>

export interface AppError extends Error {
  /** Error code for programmatic handling */
  readonly code: ErrorCode

  /** Structured metadata for debugging */
  readonly context: ErrorContext

  /**
   * Indicates whether this is an expected runtime failure (true) or a programmer
   * error / invariant violation (false).
   *
   * @remarks
   * Expected, recoverable failures should travel as `ResultError` values inside a
   * `ResultOrErrors` instead of being thrown. A thrown `AppError` with
   * `isOperational: false` marks misuse of an API: an empty error list, or a
   * read of the wrong branch of a result.
   *
   * @default true
   */
  readonly isOperational: boolean

  /**
   * Underlying cause
   *
   * See {@link https://developer.mozilla.org/en-US/docs/Web/JavaScript/Reference/Global_Objects/Error/cause Error.cause}
   */
  readonly cause?: unknown
}
