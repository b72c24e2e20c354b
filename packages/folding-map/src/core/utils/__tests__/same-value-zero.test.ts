import { sameValueZero } from "../same-value-zero"

describe("sameValueZero", () => {
  it("treats NaN as equal to itself", () => {
    expect(sameValueZero(Number.NaN, Number.NaN)).toBe(true)
  })

  it("treats signed zeros as equal", () => {
    expect(sameValueZero(0, -0)).toBe(true)
  })

  it("does not coerce", () => {
    expect(sameValueZero(1, "1")).toBe(false)
    expect(sameValueZero(null, undefined)).toBe(false)
  })

  it("compares objects by identity", () => {
    const value = { a: 1 }

    expect(sameValueZero(value, value)).toBe(true)
    expect(sameValueZero(value, { a: 1 })).toBe(false)
  })
})
