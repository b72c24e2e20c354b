import { describeKey } from "../describe-key"

describe("describeKey", () => {
  it.each([
    ["a string", "clown", '"clown"'],
    ["a number", 1.5, "1.5"],
    ["a bigint", 10n, "10n"],
    ["a boolean", true, "true"],
    ["undefined", undefined, "undefined"],
    ["null", null, "null"],
    ["an array", [1, "a", [null]], '[1, "a", [null]]'],
    ["an object", { a: 1 }, "[object Object]"],
    ["a prototype-less object", Object.create(null), "[object Object]"],
    ["a date", new Date(0), "[object Date]"],
  ])("renders %s", (_label, key, expected) => {
    expect(describeKey(key)).toBe(expected)
  })

  it("renders symbols", () => {
    expect(describeKey(Symbol("clown"))).toBe("Symbol(clown)")
  })

  it("renders functions by name", () => {
    function lookup() {
      return undefined
    }

    expect(describeKey(lookup)).toBe("[function lookup]")
  })

  it("renders an array that contains itself", () => {
    const key: unknown[] = [1]
    key.push(key)

    expect(describeKey(key)).toBe("[1, [...]]")
  })

  it("renders a shared, non-cyclic array in full each time", () => {
    const shared = ["a"]

    expect(describeKey([shared, shared])).toBe('[["a"], ["a"]]')
  })
})
