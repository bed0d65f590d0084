import { isMarker, Result } from "../markers"

describe("Result markers", () => {
  it("tags each marker with its kind", () => {
    expect(Result.success.kind).toBe("success")
    expect(Result.created.kind).toBe("created")
    expect(Result.deleted.kind).toBe("deleted")
    expect(Result.updated.kind).toBe("updated")
  })

  it("are frozen singletons", () => {
    expect(Object.isFrozen(Result)).toBe(true)
    expect(Object.isFrozen(Result.created)).toBe(true)
    expect(Result.created).toBe(Result.created)
  })

  it("isMarker() compares by identity", () => {
    expect(isMarker(Result.updated)).toBe(true)
    expect(isMarker({ kind: "updated" })).toBe(false)
    expect(isMarker(undefined)).toBe(false)
  })
})
