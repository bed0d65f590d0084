export const builtInErrorKinds = [
  "failure",
  "unexpected",
  "validation",
  "conflict",
  "not_found",
  "unauthorized",
  "forbidden",
] as const

export type BuiltInErrorKind = (typeof builtInErrorKinds)[number]

/**
 * A domain-specific kind outside the fixed set, identified by a numeric tag.
 */
export type CustomErrorKind = Readonly<{ custom: number }>

export type ErrorKind = BuiltInErrorKind | "custom"

export type ErrorKindInput = BuiltInErrorKind | CustomErrorKind

/**
 * Numeric tags of the built-in kinds.
 *
 * These are stable and may be used by presentation layers that key on numbers.
 */
export const ErrorKindCodes = {
  failure: 0,
  unexpected: 1,
  validation: 2,
  conflict: 3,
  not_found: 4,
  unauthorized: 5,
  forbidden: 6,
} as const satisfies Record<BuiltInErrorKind, number>

export function isBuiltInErrorKind(value: unknown): value is BuiltInErrorKind {
  return typeof value === "string" && (builtInErrorKinds as readonly string[]).includes(value)
}
