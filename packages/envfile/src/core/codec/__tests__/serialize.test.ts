import { ParseError } from "../../errors/errors"
import { parse } from "../parse"
import { formatValue, serialize } from "../serialize"

describe("formatValue", () => {
  it("leaves plain values bare", () => {
    expect(formatValue("world")).toBe("world")
    expect(formatValue("postgres://db:5432/app")).toBe("postgres://db:5432/app")
    expect(formatValue("")).toBe("")
  })

  it("quotes values with whitespace, comment or quote characters", () => {
    expect(formatValue("hello world")).toBe('"hello world"')
    expect(formatValue("a#b")).toBe('"a#b"')
    expect(formatValue("k=v")).toBe('"k=v"')
    expect(formatValue("it's")).toBe('"it\'s"')
  })

  it("escapes backslashes, quotes and newlines inside quotes", () => {
    expect(formatValue('say "hi"')).toBe('"say \\"hi\\""')
    expect(formatValue("a\\b")).toBe('"a\\\\b"')
    expect(formatValue("one\ntwo")).toBe('"one\\ntwo"')
  })
})

describe("serialize", () => {
  it("joins lines with \\n and no trailing newline", () => {
    expect(
      serialize([
        { key: "HELLO", value: "world" },
        { key: "PORT", value: "8080" },
      ]),
    ).toBe("HELLO=world\nPORT=8080")
  })

  it("serializes nothing to the empty string", () => {
    expect(serialize([])).toBe("")
  })

  it("rejects a key the format cannot represent", () => {
    expect(() => serialize([{ key: "OK", value: "1" }, { key: "NOT OK", value: "2" }])).toThrow(
      ParseError,
    )
    expect(() => serialize([{ key: "OK", value: "1" }, { key: "NOT OK", value: "2" }])).toThrow(
      expect.objectContaining({ kind: "invalid_key", line: 2 }),
    )
  })

  it("is read back unchanged by parse", () => {
    const entries = [
      { key: "PLAIN", value: "value" },
      { key: "SPACED", value: "  padded  " },
      { key: "MULTI", value: "line one\nline two\r\n" },
      { key: "QUOTES", value: `it's "quoted"` },
      { key: "SLASHES", value: "C:\\temp\\dir" },
      { key: "HASH", value: "#not-a-comment" },
      { key: "EMPTY", value: "" },
      { key: "TAB", value: "a\tb" },
    ]

    expect(parse(serialize(entries))).toEqual(entries)
  })
})
