import type { NonEmptyReadonlyArray, ResultState } from "./result-state"
import { InvalidStateAccessError, PreconditionViolationError } from "./errors"
import type { ResultError } from "./result-error"

const NO_ERRORS: readonly ResultError[] = Object.freeze([])

/**
 * Either a value of type `T` or a non-empty, ordered list of {@link ResultError}s.
 *
 * @remarks
 * Reading `value` on a failure, or `errors` / `firstError` on a success, throws
 * an {@link InvalidStateAccessError}. Those throws flag a missing `isError`
 * check and are not meant to be caught by domain code.
 *
 * @example
 * ```ts
 * function rename(name: string): ResultOrErrors<Updated> {
 *   if (name.length < 3) {
 *     return ResultOrErrors.fail(ResultError.validation("User.Name", "Name is too short"))
 *   }
 *   return ResultOrErrors.ok(Result.updated)
 * }
 *
 * const result = rename("Al")
 * if (result.isError) {
 *   console.log(result.firstError.code) // "User.Name"
 * }
 * ```
 */
export class ResultOrErrors<T> {
  private constructor(private readonly current: ResultState<T>) {
    Object.freeze(current)
    Object.freeze(this)
  }

  static ok<T>(value: T): ResultOrErrors<T> {
    const state: ResultState<T> = { kind: "success", value }
    return new ResultOrErrors(state)
  }

  /**
   * Creates a failed result from one or more errors, in argument order.
   */
  static fail<T>(first: ResultError, ...rest: ResultError[]): ResultOrErrors<T> {
    return ResultOrErrors.failed<T>([first, ...rest])
  }

  /**
   * Creates a failed result from a collection, copied eagerly.
   *
   * @throws {PreconditionViolationError} when the collection is empty
   */
  static failAll<T>(errors: Iterable<ResultError>): ResultOrErrors<T> {
    const [first, ...rest] = [...errors]

    if (first === undefined) {
      throw PreconditionViolationError.emptyErrors()
    }

    return ResultOrErrors.failed<T>([first, ...rest])
  }

  private static failed<T>(errors: [ResultError, ...ResultError[]]): ResultOrErrors<T> {
    Object.freeze(errors)
    const state: ResultState<T> = { kind: "failure", errors }
    return new ResultOrErrors(state)
  }

  private static passThrough<U>(errors: NonEmptyReadonlyArray<ResultError>): ResultOrErrors<U> {
    const state: ResultState<U> = { kind: "failure", errors }
    return new ResultOrErrors(state)
  }

  get state(): ResultState<T> {
    return this.current
  }

  get isError(): boolean {
    return this.current.kind === "failure"
  }

  get isSuccess(): boolean {
    return this.current.kind === "success"
  }

  /**
   * @throws {InvalidStateAccessError} when this result is a failure
   */
  get value(): T {
    const state = this.current
    if (state.kind === "failure") {
      throw InvalidStateAccessError.wrongBranch("value", "failure")
    }

    return state.value
  }

  /**
   * @throws {InvalidStateAccessError} when this result is a success
   */
  get errors(): NonEmptyReadonlyArray<ResultError> {
    const state = this.current
    if (state.kind === "success") {
      throw InvalidStateAccessError.wrongBranch("errors", "success")
    }

    return state.errors
  }

  /**
   * @throws {InvalidStateAccessError} when this result is a success
   */
  get firstError(): ResultError {
    const state = this.current
    if (state.kind === "success") {
      throw InvalidStateAccessError.wrongBranch("firstError", "success")
    }

    return state.errors[0]
  }

  /** Errors of a failure, or an empty list for a success. Never throws. */
  get errorsOrEmpty(): readonly ResultError[] {
    const state = this.current
    return state.kind === "failure" ? state.errors : NO_ERRORS
  }

  match<R>(
    onValue: (value: T) => R,
    onErrors: (errors: NonEmptyReadonlyArray<ResultError>) => R,
  ): R {
    const state = this.current
    return state.kind === "success" ? onValue(state.value) : onErrors(state.errors)
  }

  matchFirst<R>(onValue: (value: T) => R, onFirstError: (error: ResultError) => R): R {
    const state = this.current
    return state.kind === "success" ? onValue(state.value) : onFirstError(state.errors[0])
  }

  switch(
    onValue: (value: T) => void,
    onErrors: (errors: NonEmptyReadonlyArray<ResultError>) => void,
  ): void {
    const state = this.current
    if (state.kind === "success") {
      onValue(state.value)
      return
    }

    onErrors(state.errors)
  }

  map<U>(fn: (value: T) => U): ResultOrErrors<U> {
    const state = this.current
    if (state.kind === "failure") return ResultOrErrors.passThrough<U>(state.errors)

    return ResultOrErrors.ok(fn(state.value))
  }

  /**
   * Chains an operation that can itself fail. Failures skip `fn`.
   */
  andThen<U>(fn: (value: T) => ResultOrErrors<U>): ResultOrErrors<U> {
    const state = this.current
    if (state.kind === "failure") return ResultOrErrors.passThrough<U>(state.errors)

    return fn(state.value)
  }

  /**
   * Recovers from a failure by computing a replacement value.
   */
  orElse(fn: (errors: NonEmptyReadonlyArray<ResultError>) => T): ResultOrErrors<T> {
    const state = this.current
    if (state.kind === "success") return this

    return ResultOrErrors.ok(fn(state.errors))
  }

  /**
   * Turns a success into a failure with `error` when `predicate` holds for its value.
   */
  failIf(predicate: (value: T) => boolean, error: ResultError): ResultOrErrors<T> {
    const state = this.current
    if (state.kind === "failure" || !predicate(state.value)) return this

    return ResultOrErrors.fail<T>(error)
  }

  valueOr(fallback: T): T {
    const state = this.current
    return state.kind === "success" ? state.value : fallback
  }
}
