import { type ResultError, ResultOrErrors } from "@outcome/result"
import { PersonErrors } from "../model/person.errors"
import type { PersonDraft, PersonRules } from "../model/person.model"

type NameRules = Pick<PersonRules, "nameMinLength" | "nameMaxLength">

function nameError(name: string, rules: NameRules): ResultError | undefined {
  if (name.length < rules.nameMinLength) return PersonErrors.nameTooShort(rules.nameMinLength)
  if (name.length > rules.nameMaxLength) return PersonErrors.nameTooLong(rules.nameMaxLength)
  return undefined
}

/**
 * Trims and checks a name on its own, as used when renaming.
 */
export function validateName(name: string, rules: NameRules): ResultOrErrors<string> {
  const trimmed = name.trim()
  const error = nameError(trimmed, rules)

  return error ? ResultOrErrors.fail(error) : ResultOrErrors.ok(trimmed)
}

/**
 * Checks every rule and reports all violations in rule order: name, then age.
 */
export function validatePerson(
  draft: PersonDraft,
  rules: PersonRules,
): ResultOrErrors<PersonDraft> {
  const name = draft.name.trim()
  const errors: ResultError[] = []

  const invalidName = nameError(name, rules)
  if (invalidName) errors.push(invalidName)

  if (draft.age < rules.minAge) errors.push(PersonErrors.tooYoung(rules.minAge))

  if (errors.length > 0) return ResultOrErrors.failAll(errors)

  return ResultOrErrors.ok({ name, age: draft.age })
}
