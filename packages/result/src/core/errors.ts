import { BaseError } from "@outcome/errors"

export type ResultAccessor = "value" | "errors" | "firstError"

export type ResultStateKind = "success" | "failure"

export class PreconditionViolationError extends BaseError<"precondition_violation"> {
  static emptyErrors(): PreconditionViolationError {
    return new PreconditionViolationError(
      "Cannot create a failed result from an empty error collection. Provide at least one error.",
      { code: "precondition_violation", isOperational: false },
    )
  }
}

export class InvalidStateAccessError extends BaseError<"invalid_state_access"> {
  static wrongBranch(
    accessor: ResultAccessor,
    state: ResultStateKind,
  ): InvalidStateAccessError {
    const hint =
      state === "failure"
        ? "Check isError before reading the value."
        : "Check isError before reading the errors."

    return new InvalidStateAccessError(`Cannot read \`${accessor}\` of a ${state} result. ${hint}`, {
      code: "invalid_state_access",
      context: { accessor, state },
      isOperational: false,
    })
  }
}
