import { InvalidStateAccessError, PreconditionViolationError } from "../errors"
import { Result } from "../markers"
import { ResultError } from "../result-error"
import { ResultOrErrors } from "../result-or-errors"

type Person = { name: string }

const nameTooShort = ResultError.validation("User.Name", "Name is too short")
const tooYoung = ResultError.validation("User.Age", "User is too young")

describe("ResultOrErrors", () => {
  describe("ok()", () => {
    it("wraps an object value", () => {
      const person: Person = { name: "Ada" }

      const result = ResultOrErrors.ok(person)

      expect(result.isSuccess).toBe(true)
      expect(result.isError).toBe(false)
      expect(result.value).toBe(person)
    })

    it("wraps a primitive value", () => {
      const result = ResultOrErrors.ok(4)

      expect(result.isSuccess).toBe(true)
      expect(result.value).toBe(4)
    })

    it("wraps undefined as a success", () => {
      const result = ResultOrErrors.ok(undefined)

      expect(result.isSuccess).toBe(true)
      expect(result.value).toBeUndefined()
    })

    it.each([Result.success, Result.created, Result.deleted, Result.updated])(
      "wraps the $kind marker",
      (marker) => {
        const result = ResultOrErrors.ok(marker)

        expect(result.isSuccess).toBe(true)
        expect(result.isError).toBe(false)
        expect(result.value).toBe(marker)
      },
    )

    it("exposes the success state", () => {
      const result = ResultOrErrors.ok(1)

      expect(result.state).toEqual({ kind: "success", value: 1 })
    })
  })

  describe("fail()", () => {
    it("wraps a single error", () => {
      const result = ResultOrErrors.fail<Person>(nameTooShort)

      expect(result.isError).toBe(true)
      expect(result.isSuccess).toBe(false)
      expect(result.errors).toEqual([nameTooShort])
      expect(result.firstError).toBe(nameTooShort)
    })

    it("keeps two errors in argument order", () => {
      const result = ResultOrErrors.fail<Person>(nameTooShort, tooYoung)

      expect(result.errors).toHaveLength(2)
      expect(result.errors[0]).toBe(nameTooShort)
      expect(result.errors[1]).toBe(tooYoung)
      expect(result.firstError).toBe(nameTooShort)
    })

    it("keeps three errors in argument order", () => {
      const conflict = ResultError.conflict("User.Email", "Email already taken")

      const result = ResultOrErrors.fail<boolean>(tooYoung, conflict, nameTooShort)

      expect(result.errors).toEqual([tooYoung, conflict, nameTooShort])
    })

    it("accepts the same error more than once", () => {
      const result = ResultOrErrors.fail<boolean>(nameTooShort, nameTooShort, nameTooShort)

      expect(result.errors).toHaveLength(3)
    })

    it("exposes the failure state", () => {
      const result = ResultOrErrors.fail<Person>(nameTooShort)

      expect(result.state).toEqual({ kind: "failure", errors: [nameTooShort] })
    })
  })

  describe("failAll()", () => {
    it("keeps list order", () => {
      const errors = [nameTooShort, tooYoung]

      const result = ResultOrErrors.failAll<Person>(errors)

      expect(result.isError).toBe(true)
      expect(result.errors).toEqual([nameTooShort, tooYoung])
      expect(result.firstError).toBe(nameTooShort)
    })

    it("accepts a set in insertion order", () => {
      const result = ResultOrErrors.failAll<Person>(new Set([tooYoung, nameTooShort]))

      expect(result.errors).toEqual([tooYoung, nameTooShort])
    })

    it("copies the input eagerly", () => {
      const errors = [nameTooShort]

      const result = ResultOrErrors.failAll<Person>(errors)
      errors.push(tooYoung)

      expect(result.errors).toEqual([nameTooShort])
    })

    it("returns a frozen error list", () => {
      const result = ResultOrErrors.failAll<Person>([nameTooShort, tooYoung])

      expect(Object.isFrozen(result.errors)).toBe(true)
    })

    it("throws a precondition violation for an empty list", () => {
      expect(() => ResultOrErrors.failAll<Person>([])).toThrow(PreconditionViolationError)
    })

    it("throws a precondition violation for an empty set", () => {
      expect(() => ResultOrErrors.failAll<Person>(new Set())).toThrow(
        "Cannot create a failed result from an empty error collection. Provide at least one error.",
      )
    })

    it("marks the precondition violation as non-operational", () => {
      try {
        ResultOrErrors.failAll<Person>([])
        expect.unreachable()
      } catch (err) {
        expect(err).toBeInstanceOf(PreconditionViolationError)
        expect(err).toMatchObject({ code: "precondition_violation", isOperational: false })
      }
    })
  })

  describe("wrong-branch access", () => {
    it("throws when reading value of a failure", () => {
      const result = ResultOrErrors.fail<Person>(nameTooShort)

      expect(() => result.value).toThrow(InvalidStateAccessError)
      expect(() => result.value).toThrow(
        "Cannot read `value` of a failure result. Check isError before reading the value.",
      )
    })

    it("throws when reading errors of a success", () => {
      const result = ResultOrErrors.ok<Person>({ name: "Ada" })

      expect(() => result.errors).toThrow(
        "Cannot read `errors` of a success result. Check isError before reading the errors.",
      )
    })

    it("throws when reading firstError of a success", () => {
      const result = ResultOrErrors.ok<Person>({ name: "Ada" })

      expect(() => result.firstError).toThrow(InvalidStateAccessError)
    })

    it("records the accessor and state in the error context", () => {
      const result = ResultOrErrors.ok(Result.created)

      try {
        void result.firstError
        expect.unreachable()
      } catch (err) {
        expect(err).toMatchObject({
          code: "invalid_state_access",
          context: { accessor: "firstError", state: "success" },
          isOperational: false,
        })
      }
    })
  })

  describe("guarded access", () => {
    it("reads errors behind an isError check", () => {
      const result = ResultOrErrors.fail<Person>(nameTooShort)

      const summary = result.isError ? result.firstError.code : result.value.name

      expect(summary).toBe("User.Name")
    })

    it("reads the value behind an isSuccess check", () => {
      const result = ResultOrErrors.ok<Person>({ name: "Grace" })

      const summary = result.isSuccess ? result.value.name : result.firstError.code

      expect(summary).toBe("Grace")
    })
  })

  describe("immutability", () => {
    it("freezes the container and its state", () => {
      const result = ResultOrErrors.ok({ name: "Ada" })

      expect(Object.isFrozen(result)).toBe(true)
      expect(Object.isFrozen(result.state)).toBe(true)
    })
  })
})
