export {
  InvalidStateAccessError,
  PreconditionViolationError,
  type ResultAccessor,
  type ResultStateKind,
} from "./core/errors"
export {
  type Created,
  type Deleted,
  isMarker,
  type Marker,
  Result,
  type Success,
  type Updated,
} from "./core/markers"
export { type CreateResultErrorInput, isResultError, ResultError } from "./core/result-error"
export { ResultOrErrors } from "./core/result-or-errors"
export {
  type ErrorCollection,
  type NonCollection,
  fromError,
  fromErrors,
  fromValue,
  isErrorCollection,
  toResultOrErrors,
} from "./core/utils/convert"
export {
  type BuiltInErrorKind,
  builtInErrorKinds,
  type CustomErrorKind,
  type ErrorKind,
  ErrorKindCodes,
  type ErrorKindInput,
  isBuiltInErrorKind,
} from "./ports/error-kind"
export type { ErrorMetadata, ResultErrorShape } from "./ports/result-error"
export type { NonEmptyReadonlyArray, ResultState } from "./core/result-state"
