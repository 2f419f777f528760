import { DecodeError, EncodeError } from "../../errors/errors"
import { env } from "../../schema/descriptors"
import { coerce, describeValue, format } from "../coerce"

describe("coerce", () => {
  it("keeps strings verbatim", () => {
    expect(coerce(env.string(), "  spaced  ", "s")).toBe("  spaced  ")
  })

  it.each([
    ["42", 42],
    ["-7", -7],
    ["+3", 3],
    ["007", 7],
  ])("reads integer %s", (text, value) => {
    expect(coerce(env.integer(), text, "n")).toBe(value)
  })

  it.each(["4.2", "1e3", "", "abc", "9007199254740993"])("rejects integer %j", (text) => {
    expect(() => coerce(env.integer(), text, "n")).toThrow(DecodeError)
  })

  it.each([
    ["1.5", 1.5],
    ["-.5", -0.5],
    ["2e3", 2000],
    ["10", 10],
    ["Infinity", Number.POSITIVE_INFINITY],
    ["-Infinity", Number.NEGATIVE_INFINITY],
  ])("reads number %s", (text, value) => {
    expect(coerce(env.number(), text, "f")).toBe(value)
  })

  it("reads NaN", () => {
    expect(coerce(env.number(), "NaN", "f")).toBeNaN()
  })

  it.each(["1.2.3", "0x10", "one", ""])("rejects number %j", (text) => {
    expect(() => coerce(env.number(), text, "f")).toThrow(DecodeError)
  })

  it("reads bigints beyond the safe integer range", () => {
    expect(coerce(env.bigint(), "123456789012345678901234567890", "b")).toBe(
      123456789012345678901234567890n,
    )
    expect(coerce(env.bigint(), "+5", "b")).toBe(5n)
    expect(() => coerce(env.bigint(), "1.0", "b")).toThrow(DecodeError)
  })

  it.each([
    ["true", true],
    ["TRUE", true],
    ["True", true],
    ["1", true],
    ["false", false],
    ["FALSE", false],
    ["0", false],
  ])("reads boolean %s", (text, value) => {
    expect(coerce(env.boolean(), text, "flag")).toBe(value)
  })

  it.each(["yes", "no", "2", ""])("rejects boolean %j", (text) => {
    expect(() => coerce(env.boolean(), text, "flag")).toThrow(DecodeError)
  })

  it("matches enum values exactly", () => {
    const level = env.enum(["debug", "info"])

    expect(coerce(level, "info", "level")).toBe("info")
    expect(() => coerce(level, "INFO", "level")).toThrow(
      'Invalid value for "level": expected one of "debug" | "info", found "INFO"',
    )
  })

  it("reports the path and the offending text", () => {
    expect(() => coerce(env.integer(), "notanumber", "count")).toThrow(
      expect.objectContaining({
        kind: "invalid_value",
        path: "count",
        expected: "integer",
        found: '"notanumber"',
      }),
    )
  })
})

describe("format", () => {
  it("renders scalars canonically", () => {
    expect(format(env.string(), "x y", "s")).toBe("x y")
    expect(format(env.integer(), -12, "n")).toBe("-12")
    expect(format(env.number(), 0.25, "f")).toBe("0.25")
    expect(format(env.number(), Number.NEGATIVE_INFINITY, "f")).toBe("-Infinity")
    expect(format(env.bigint(), 10n ** 20n, "b")).toBe("100000000000000000000")
    expect(format(env.boolean(), false, "flag")).toBe("false")
    expect(format(env.enum(["a", "b"]), "b", "e")).toBe("b")
  })

  it("rejects values of the wrong type", () => {
    expect(() => format(env.integer(), 1.5, "port")).toThrow(EncodeError)
    expect(() => format(env.integer(), 1.5, "port")).toThrow(
      'Cannot encode "port": expected integer, found number 1.5',
    )
    expect(() => format(env.string(), 1, "s")).toThrow(EncodeError)
    expect(() => format(env.enum(["a"]), "z", "e")).toThrow(EncodeError)
  })
})

describe("describeValue", () => {
  it.each([
    [null, "null"],
    [undefined, "undefined"],
    ["x", '"x"'],
    [3, "number 3"],
    [true, "boolean true"],
    [2n, "bigint 2"],
    [[1], "array"],
    [{}, "object"],
  ])("describes value %#", (value, text) => {
    expect(describeValue(value)).toBe(text)
  })
})
