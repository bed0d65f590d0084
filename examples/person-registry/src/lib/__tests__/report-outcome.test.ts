import type { Logger } from "@outcome/logger"
import { Result, ResultError, ResultOrErrors } from "@outcome/result"
import { mock } from "vitest-mock-extended"
import { reportOutcome } from "../report-outcome"

describe("reportOutcome", () => {
  it("logs a success at debug", () => {
    const logger = mock<Logger>()

    reportOutcome(logger, "people.remove", ResultOrErrors.ok(Result.deleted))

    expect(logger.debug).toHaveBeenCalledWith("people.remove succeeded", {
      operation: "people.remove",
      outcome: "success",
    })
    expect(logger.info).not.toHaveBeenCalled()
  })

  it("logs expected failures at info with codes and kinds", () => {
    const logger = mock<Logger>()
    const result = ResultOrErrors.fail<number>(
      ResultError.validation("Person.Name", "too short"),
      ResultError.conflict("Person.Duplicate", "taken"),
    )

    reportOutcome(logger, "people.register", result)

    expect(logger.info).toHaveBeenCalledWith("people.register rejected", {
      operation: "people.register",
      outcome: "failure",
      errorCodes: ["Person.Name", "Person.Duplicate"],
      errorKinds: ["validation", "conflict"],
    })
    expect(logger.error).not.toHaveBeenCalled()
  })

  it("logs at error when any error is unexpected", () => {
    const logger = mock<Logger>()
    const result = ResultOrErrors.fail<number>(
      ResultError.notFound("Person.NotFound", "missing"),
      ResultError.unexpected(),
    )

    reportOutcome(logger, "people.find", result)

    expect(logger.error).toHaveBeenCalledWith("people.find failed", {
      operation: "people.find",
      outcome: "failure",
      errorCodes: ["Person.NotFound", "General.Unexpected"],
      errorKinds: ["not_found", "unexpected"],
    })
    expect(logger.info).not.toHaveBeenCalled()
  })

  it("returns the same result", () => {
    const result = ResultOrErrors.ok(1)

    expect(reportOutcome(mock<Logger>(), "op", result)).toBe(result)
  })
})
