import { type Deleted, Result, ResultOrErrors, type Updated } from "@outcome/result"
import { v4 as uuidv4 } from "uuid"
import { PersonErrors } from "../model/person.errors"
import type { Person, PersonDraft, PersonId, PersonRules } from "../model/person.model"
import { validateName, validatePerson } from "./validate-person"

export type PersonDirectoryDeps = {
  rules: PersonRules
  generateId?: () => PersonId
}

/**
 * In-memory registry of people. Every operation reports expected failures
 * (invalid input, duplicates, unknown ids) as a failed result.
 */
export class PersonDirectory {
  private readonly people = new Map<PersonId, Person>()
  private readonly rules: PersonRules
  private readonly generateId: () => PersonId

  constructor(deps: PersonDirectoryDeps) {
    this.rules = deps.rules
    this.generateId = deps.generateId ?? (() => uuidv4())
  }

  register(draft: PersonDraft): ResultOrErrors<Person> {
    return validatePerson(draft, this.rules)
      .andThen((valid) => this.ensureNameAvailable(valid.name).map(() => valid))
      .map((valid) => {
        const person: Person = { id: this.generateId(), name: valid.name, age: valid.age }
        this.people.set(person.id, person)
        return person
      })
  }

  find(id: PersonId): ResultOrErrors<Person> {
    const person = this.people.get(id)

    return person ? ResultOrErrors.ok(person) : ResultOrErrors.fail(PersonErrors.notFound(id))
  }

  rename(id: PersonId, name: string): ResultOrErrors<Updated> {
    return this.find(id).andThen((person) =>
      validateName(name, this.rules)
        .andThen((validName) => this.ensureNameAvailable(validName, person.id))
        .map((validName) => {
          this.people.set(id, { ...person, name: validName })
          return Result.updated
        }),
    )
  }

  remove(id: PersonId): ResultOrErrors<Deleted> {
    return this.find(id).map(() => {
      this.people.delete(id)
      return Result.deleted
    })
  }

  list(): Person[] {
    return [...this.people.values()]
  }

  private ensureNameAvailable(name: string, exceptId?: PersonId): ResultOrErrors<string> {
    const key = name.toLowerCase()
    const taken = this.list().some(
      (person) => person.id !== exceptId && person.name.toLowerCase() === key,
    )

    return taken ? ResultOrErrors.fail(PersonErrors.duplicateName(name)) : ResultOrErrors.ok(name)
  }
}
