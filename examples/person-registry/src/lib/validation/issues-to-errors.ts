import { ResultError } from "@outcome/result"

export type ZodMiniIssue = {
  path: PropertyKey[]
  message: string
}

export type ZodMiniError = {
  issues: ZodMiniIssue[]
}

/**
 * The slice of a zod/mini schema this module relies on.
 */
export type SafeParseSchema<T> = {
  safeParse(
    input: unknown,
  ): { success: true; data: T } | { success: false; error: ZodMiniError }
}

function formatPath(path: PropertyKey[]): string {
  let out = ""
  for (const part of path) {
    if (typeof part === "number") out += `[${part}]`
    else out += out ? `.${String(part)}` : String(part)
  }
  return out
}

/**
 * Maps each schema issue to a validation error coded `<prefix>.<path>`.
 *
 * @example
 * ```ts
 * issuesToErrors("Request", [{ path: ["age"], message: "Expected number" }])
 * // [ResultError.validation("Request.age", "Expected number")]
 * ```
 */
export function issuesToErrors(prefix: string, issues: readonly ZodMiniIssue[]): ResultError[] {
  return issues.map((issue) => {
    const path = formatPath(issue.path)
    return ResultError.validation(path ? `${prefix}.${path}` : prefix, issue.message)
  })
}
