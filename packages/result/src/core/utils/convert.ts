import { isResultError, type ResultError } from "../result-error"
import { ResultOrErrors } from "../result-or-errors"

export type ErrorCollection = readonly ResultError[] | ReadonlySet<ResultError>

export function fromValue<T>(value: T): ResultOrErrors<T> {
  return ResultOrErrors.ok(value)
}

export function fromError<T>(error: ResultError): ResultOrErrors<T> {
  return ResultOrErrors.fail<T>(error)
}

/**
 * @throws {PreconditionViolationError} when `errors` is empty
 */
export function fromErrors<T>(errors: Iterable<ResultError>): ResultOrErrors<T> {
  return ResultOrErrors.failAll<T>(errors)
}

/**
 * True for arrays and sets whose every element is a ResultError.
 * Empty arrays and sets count as error collections.
 */
export function isErrorCollection(value: unknown): value is ErrorCollection {
  if (Array.isArray(value)) return value.every(isResultError)
  if (value instanceof Set) return [...value].every(isResultError)
  return false
}

/**
 * Any `T` except arrays and sets, which `toResultOrErrors` reads as error
 * collections. Wrap collection values with {@link fromValue}.
 */
export type NonCollection<T> = T extends readonly unknown[] | ReadonlySet<unknown> ? never : T

/**
 * Wraps whatever an operation produced into a result.
 *
 * - a `ResultError` becomes a one-error failure
 * - an array or set of `ResultError`s becomes a failure in the same order
 * - anything else, markers included, becomes a success
 *
 * @remarks
 * Array and set values do not compile as successes: the value overload takes
 * {@link NonCollection}. Use {@link fromValue} for them, empty ones included.
 *
 * @throws {PreconditionViolationError} when given an empty error collection
 *
 * @example
 * ```ts
 * const created: ResultOrErrors<Created> = toResultOrErrors(Result.created)
 * const failed: ResultOrErrors<Person> = toResultOrErrors([nameError, ageError])
 * const scores: ResultOrErrors<number[]> = fromValue([])
 * ```
 */
export function toResultOrErrors<T>(input: ResultError | ErrorCollection): ResultOrErrors<T>
export function toResultOrErrors<T>(input: NonCollection<T>): ResultOrErrors<T>
export function toResultOrErrors<T>(
  input: T | ResultError | ErrorCollection,
): ResultOrErrors<T> {
  if (isResultError(input)) return ResultOrErrors.fail<T>(input)
  if (isErrorCollection(input)) return ResultOrErrors.failAll<T>(input)

  return ResultOrErrors.ok<T>(input)
}
