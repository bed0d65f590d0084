export type PersonId = string

export type Person = Readonly<{
  id: PersonId
  name: string
  age: number
}>

export type PersonDraft = Readonly<{
  name: string
  age: number
}>

export type PersonRules = Readonly<{
  nameMinLength: number
  nameMaxLength: number
  minAge: number
}>
