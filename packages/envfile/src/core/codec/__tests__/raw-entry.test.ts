import { isValidKey, toFlatMapping } from "../raw-entry"

describe("isValidKey", () => {
  it.each(["A", "_A", "HELLO_WORLD", "a.b", "KEY_0", "lower"])("accepts %s", (key) => {
    expect(isValidKey(key)).toBe(true)
  })

  it.each(["", "0A", "A-B", "A B", "A=B", ".A"])("rejects %j", (key) => {
    expect(isValidKey(key)).toBe(false)
  })
})

describe("toFlatMapping", () => {
  it("keeps the last value and the first position of duplicates", () => {
    const mapping = toFlatMapping([
      { key: "A", value: "1" },
      { key: "B", value: "2" },
      { key: "A", value: "3" },
    ])

    expect([...mapping]).toEqual([
      ["A", "3"],
      ["B", "2"],
    ])
  })
})
