import { exact } from "../exact"
import { foldCase } from "../fold-case"
import { normalizerNames, stringNormalizers } from "../normalizers"
import { sortElements } from "../sort-elements"
import { stripWhitespace } from "../strip-whitespace"

describe("normalizers", () => {
  describe("foldCase", () => {
    it("lower-cases strings", () => {
      expect(foldCase("CLOWN")).toBe("clown")
    })

    it("passes other keys through", () => {
      const key = { id: 1 }

      expect(foldCase(42)).toBe(42)
      expect(foldCase(null)).toBeNull()
      expect(foldCase(key)).toBe(key)
    })
  })

  describe("stripWhitespace", () => {
    it("removes every whitespace run", () => {
      expect(stripWhitespace("  the \t clown\n")).toBe("theclown")
    })

    it("is case-sensitive", () => {
      expect(stripWhitespace("The Clown")).toBe("TheClown")
    })

    it("passes other keys through", () => {
      expect(stripWhitespace(7)).toBe(7)
    })
  })

  describe("sortElements", () => {
    it("sorts the characters of a string", () => {
      expect(sortElements("bca")).toBe("abc")
    })

    it("encodes number lists sorted numerically", () => {
      expect(sortElements([10, 9, 1])).toBe("numbers:[1,9,10]")
      expect(sortElements([3, 2, 1])).toBe(sortElements([1, 2, 3]))
    })

    it("encodes string lists sorted", () => {
      expect(sortElements(["b", "a"])).toBe('strings:["a","b"]')
    })

    it("keeps number and string lists apart", () => {
      expect(sortElements([1, 2])).not.toBe(sortElements(["1", "2"]))
    })

    it("encodes the empty list", () => {
      expect(sortElements([])).toBe("numbers:[]")
    })

    it.each([
      [[], "]["],
      [[1, 2], ",12:[]bemnrsu"],
      [["a"], '"":[]aginrsst'],
    ])("keeps the list %j apart from the string %j", (list, text) => {
      expect(sortElements(list)).not.toBe(sortElements(text))
    })

    it("leaves mixed lists and other values alone", () => {
      const mixed = [1, "a"]

      expect(sortElements(mixed)).toBe(mixed)
      expect(sortElements(5)).toBe(5)
    })

    it("does not reorder the caller's array", () => {
      const key = [3, 1, 2]

      sortElements(key)

      expect(key).toEqual([3, 1, 2])
    })
  })

  describe("exact", () => {
    it("is the identity", () => {
      expect(exact("AbC")).toBe("AbC")
    })
  })

  describe("stringNormalizers", () => {
    it("has an entry for every name", () => {
      expect(Object.keys(stringNormalizers).sort()).toEqual([...normalizerNames].sort())
    })

    it.each([
      ["fold-case", "The Clown", "the clown"],
      ["strip-whitespace", "The Clown", "TheClown"],
      ["sort-elements", "cab", "abc"],
      ["exact", "The Clown", "The Clown"],
    ] as const)("%s maps %s to %s", (name, key, canonical) => {
      expect(stringNormalizers[name](key)).toBe(canonical)
    })
  })
})
