import type { ResultError } from "./result-error"

export type NonEmptyReadonlyArray<T> = readonly [T, ...T[]]

/**
 * The two exclusive states of a `ResultOrErrors<T>`.
 *
 * Switch on `kind` for exhaustive handling without touching the throwing accessors.
 */
export type ResultState<T> =
  | Readonly<{ kind: "success"; value: T }>
  | Readonly<{ kind: "failure"; errors: NonEmptyReadonlyArray<ResultError> }>
