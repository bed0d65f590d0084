import { ResultError } from "@outcome/result"
import type { PersonId } from "./person.model"

export const PersonErrors = {
  nameTooShort: (minLength: number) =>
    ResultError.validation(
      "Person.Name",
      `Name must be at least ${minLength} characters long`,
      { minLength },
    ),

  nameTooLong: (maxLength: number) =>
    ResultError.validation(
      "Person.Name",
      `Name must be at most ${maxLength} characters long`,
      { maxLength },
    ),

  tooYoung: (minAge: number) =>
    ResultError.validation("Person.Age", `Person must be at least ${minAge} years old`, {
      minAge,
    }),

  duplicateName: (name: string) =>
    ResultError.conflict("Person.Duplicate", `A person named "${name}" is already registered`, {
      name,
    }),

  notFound: (id: PersonId) =>
    ResultError.notFound("Person.NotFound", `No person with id "${id}"`, { id }),
} as const
