import { describe, expect, it } from "vitest"
import { deepFreeze } from "./deep-freeze.js"

describe("deepFreeze", () => {
  it("freezes nested objects and arrays in place", () => {
    const value = { list: [{ title: "a" }], nested: { flag: true } }

    const frozen = deepFreeze(value)

    expect(frozen).toBe(value)
    expect(Object.isFrozen(value)).toBe(true)
    expect(Object.isFrozen(value.list)).toBe(true)
    expect(Object.isFrozen(value.list[0])).toBe(true)
    expect(Object.isFrozen(value.nested)).toBe(true)
  })

  it("returns primitives and null unchanged", () => {
    expect(deepFreeze(3)).toBe(3)
    expect(deepFreeze("a")).toBe("a")
    expect(deepFreeze(null)).toBeNull()
  })

  it("does not walk into objects that are already frozen", () => {
    const inner = { title: "a" }
    const outer = Object.freeze({ inner })

    deepFreeze({ outer })

    expect(Object.isFrozen(inner)).toBe(false)
  })
})
