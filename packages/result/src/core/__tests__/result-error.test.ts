import { ErrorKindCodes } from "../../ports/error-kind"
import { isResultError, ResultError } from "../result-error"

describe("ResultError", () => {
  describe("per-kind factories", () => {
    it.each([
      ["failure", ResultError.failure, 0],
      ["unexpected", ResultError.unexpected, 1],
      ["validation", ResultError.validation, 2],
      ["conflict", ResultError.conflict, 3],
      ["not_found", ResultError.notFound, 4],
      ["unauthorized", ResultError.unauthorized, 5],
      ["forbidden", ResultError.forbidden, 6],
    ])("%s tags the error with its kind", (kind, factory, numericKind) => {
      const error = factory("User.Name", "Name is too short")

      expect(error.kind).toBe(kind)
      expect(error.numericKind).toBe(numericKind)
      expect(error.code).toBe("User.Name")
      expect(error.description).toBe("Name is too short")
    })

    it.each([
      [ResultError.failure, "General.Failure", "A failure has occurred."],
      [ResultError.unexpected, "General.Unexpected", "An unexpected error has occurred."],
      [ResultError.validation, "General.Validation", "A validation error has occurred."],
      [ResultError.conflict, "General.Conflict", "A conflict error has occurred."],
      [ResultError.notFound, "General.NotFound", "A 'Not Found' error has occurred."],
      [
        ResultError.unauthorized,
        "General.Unauthorized",
        "An 'Unauthorized' error has occurred.",
      ],
      [ResultError.forbidden, "General.Forbidden", "A 'Forbidden' error has occurred."],
    ])("falls back to %# default code and description", (factory, code, description) => {
      const error = factory()

      expect(error.code).toBe(code)
      expect(error.description).toBe(description)
    })

    it("keeps empty strings instead of applying defaults", () => {
      const error = ResultError.validation("", "")

      expect(error.code).toBe("")
      expect(error.description).toBe("")
    })

    it("leaves metadata absent by default", () => {
      const error = ResultError.notFound("User.Id", "No such user")

      expect(error.metadata).toBeUndefined()
      expect("metadata" in error).toBe(false)
    })

    it("stores a frozen copy of metadata", () => {
      const metadata = { minLength: 3 }

      const error = ResultError.validation("User.Name", "Name is too short", metadata)

      expect(error.metadata).toEqual({ minLength: 3 })
      expect(error.metadata).not.toBe(metadata)
      expect(Object.isFrozen(error.metadata)).toBe(true)
    })
  })

  describe("custom kinds", () => {
    it("carries the caller's numeric tag", () => {
      const error = ResultError.custom(42, "Payment.Declined", "Card was declined")

      expect(error.kind).toBe("custom")
      expect(error.numericKind).toBe(42)
      expect(error.code).toBe("Payment.Declined")
    })

    it("create() builds built-in kinds", () => {
      const error = ResultError.create({
        kind: "conflict",
        code: "User.Email",
        description: "Email already taken",
      })

      expect(error.kind).toBe("conflict")
      expect(error.numericKind).toBe(ErrorKindCodes.conflict)
    })

    it("create() builds custom kinds with metadata", () => {
      const error = ResultError.create({
        kind: { custom: 7 },
        code: "Quota.Exceeded",
        description: "Monthly quota exceeded",
        metadata: { limit: 100 },
      })

      expect(error.kind).toBe("custom")
      expect(error.numericKind).toBe(7)
      expect(error.metadata).toEqual({ limit: 100 })
    })

    it("create() treats a custom tag as custom even when it matches a built-in number", () => {
      const error = ResultError.create({
        kind: { custom: ErrorKindCodes.not_found },
        code: "Shelf.Empty",
        description: "Nothing on the shelf",
      })

      expect(error.kind).toBe("custom")
      expect(error.numericKind).toBe(4)
    })
  })

  describe("immutability", () => {
    it("freezes instances", () => {
      const error = ResultError.failure()

      expect(Object.isFrozen(error)).toBe(true)
    })
  })

  describe("equals", () => {
    it("is true for errors with the same fields", () => {
      const a = ResultError.validation("User.Name", "Name is too short", { min: 3 })
      const b = ResultError.validation("User.Name", "Name is too short", { min: 3 })

      expect(a.equals(b)).toBe(true)
      expect(a).toEqual(b)
    })

    it("is false when the kind differs", () => {
      const a = ResultError.validation("User.Name", "Name is too short")
      const b = ResultError.conflict("User.Name", "Name is too short")

      expect(a.equals(b)).toBe(false)
    })

    it("is false when custom tags differ", () => {
      const a = ResultError.custom(1, "X", "x")
      const b = ResultError.custom(2, "X", "x")

      expect(a.equals(b)).toBe(false)
    })

    it("is false when only one side has metadata", () => {
      const a = ResultError.validation("User.Name", "Name is too short", { min: 3 })
      const b = ResultError.validation("User.Name", "Name is too short")

      expect(a.equals(b)).toBe(false)
      expect(b.equals(a)).toBe(false)
    })

    it("is false when metadata values differ", () => {
      const a = ResultError.validation("User.Name", "Name is too short", { min: 3 })
      const b = ResultError.validation("User.Name", "Name is too short", { min: 4 })

      expect(a.equals(b)).toBe(false)
    })

    it("is false when metadata keys differ", () => {
      const a = ResultError.validation("User.Name", "Name is too short", { min: 3 })
      const b = ResultError.validation("User.Name", "Name is too short", { max: 3 })

      expect(a.equals(b)).toBe(false)
    })
  })

  describe("isResultError", () => {
    it("recognises ResultError instances only", () => {
      expect(isResultError(ResultError.failure())).toBe(true)
      expect(isResultError(new Error("thrown"))).toBe(false)
      expect(
        isResultError({ code: "X", description: "x", kind: "failure", numericKind: 0 }),
      ).toBe(false)
    })
  })
})
