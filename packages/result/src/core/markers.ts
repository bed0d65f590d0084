/**
 * Payload-free success markers.
 *
 * Use one as the `T` of a `ResultOrErrors<T>` when the only thing worth
 * reporting is which kind of success happened.
 */
export type Success = Readonly<{ kind: "success" }>
export type Created = Readonly<{ kind: "created" }>
export type Deleted = Readonly<{ kind: "deleted" }>
export type Updated = Readonly<{ kind: "updated" }>

export type Marker = Success | Created | Deleted | Updated

const success: Success = Object.freeze({ kind: "success" })
const created: Created = Object.freeze({ kind: "created" })
const deleted: Deleted = Object.freeze({ kind: "deleted" })
const updated: Updated = Object.freeze({ kind: "updated" })

export const Result = Object.freeze({ success, created, deleted, updated })

export function isMarker(value: unknown): value is Marker {
  return value === success || value === created || value === deleted || value === updated
}
