import { EncodeError } from "../../errors/errors"
import { toFlat } from "../../flatten/flatten"
import { env, type Infer } from "../../schema/descriptors"
import { decode } from "../decode"
import { encode, encodeValue } from "../encode"

describe("encode", () => {
  it("writes fields in declaration order under their env keys", () => {
    const schema = env.object({ zeta: env.string(), alphaBeta: env.integer() })
    const encoded = encode(schema, { zeta: "z", alphaBeta: 1 })

    expect(encoded.preserveOrder).toBe(true)
    expect(encoded.entries()).toEqual([
      ["ZETA", "z"],
      ["ALPHA_BETA", "1"],
    ])
  })

  it("nests objects and records, indexes arrays", () => {
    const schema = env.object({
      db: env.object({ host: env.string() }),
      limits: env.record(env.integer()),
      tags: env.array(env.string()),
    })

    const flat = toFlat(encode(schema, { db: { host: "h" }, limits: { cpu: 2 }, tags: ["a", "b"] }))

    expect([...flat]).toEqual([
      ["DB__HOST", "h"],
      ["LIMITS__CPU", "2"],
      ["TAGS_0", "a"],
      ["TAGS_1", "b"],
    ])
  })

  it("omits unset optionals, empty arrays and empty records", () => {
    const schema = env.object({
      name: env.string(),
      nick: env.optional(env.string()),
      tags: env.array(env.string()),
      labels: env.record(env.string()),
    })

    expect(encode(schema, { name: "x", tags: [], labels: {} }).toJSON()).toEqual({ NAME: "x" })
  })

  it("writes the default for an unset defaulted field", () => {
    const schema = env.object({ port: env.withDefault(env.integer(), 3000) })

    expect(encodeValue(schema, {}).toJSON()).toEqual({ PORT: "3000" })
  })

  it("rejects data that does not match the schema", () => {
    const schema = env.object({ servers: env.array(env.object({ port: env.integer() })) })

    expect(() => encodeValue(schema, { servers: [{ port: 1 }, { port: "2" }] })).toThrow(EncodeError)
    expect(() => encodeValue(schema, { servers: [{ port: 1 }, { port: "2" }] })).toThrow(
      expect.objectContaining({ path: "servers[1].port", expected: "integer", found: '"2"' }),
    )
    expect(() => encodeValue(schema, { servers: "nope" })).toThrow(
      expect.objectContaining({ path: "servers", expected: "array" }),
    )
    expect(() => encodeValue(schema, null)).toThrow(
      expect.objectContaining({ path: "(root)", expected: "object", found: "null" }),
    )
  })

  describe("decode(encode(v))", () => {
    const schema = env.object({
      name: env.string(),
      port: env.integer(),
      ratio: env.number(),
      big: env.bigint(),
      debug: env.boolean(),
      level: env.enum(["debug", "info", "warn"]),
      db: env.object({ host: env.string(), replicas: env.array(env.string()) }),
      servers: env.array(env.object({ host: env.string(), port: env.integer() })),
      limits: env.record(env.object({ soft: env.integer(), hard: env.integer() })),
      motd: env.string({ key: "MESSAGE_OF_THE_DAY" }),
    })

    it.each<Infer<typeof schema>>([
      {
        name: "api",
        port: 8080,
        ratio: 0.125,
        big: 9007199254740993n,
        debug: false,
        level: "warn",
        db: { host: "db.internal", replicas: ["r1", "r2"] },
        servers: [
          { host: "a", port: 1 },
          { host: "b", port: 2 },
        ],
        limits: { cpu: { soft: 1, hard: 2 }, memory: { soft: 256, hard: 512 } },
        motd: 'multi\nline "quoted" # text',
      },
      {
        name: "",
        port: -1,
        ratio: 1e21,
        big: -5n,
        debug: true,
        level: "debug",
        db: { host: "h", replicas: [] },
        servers: [],
        limits: {},
        motd: " ",
      },
    ])("round-trips value %#", (value) => {
      expect(decode(schema, encode(schema, value))).toEqual(value)
    })

    it("rejects a sequence element that would encode to no keys", () => {
      const nested = env.object({ l: env.array(env.array(env.string())) })

      expect(() => encode(nested, { l: [[], ["x"]] })).toThrow(EncodeError)
      expect(() => encode(nested, { l: [[], ["x"]] })).toThrow(
        'Cannot encode "l[0]": expected an element that encodes to at least one key, found array',
      )
      expect(decode(nested, encode(nested, { l: [["w"], ["x", "y"]] }))).toEqual({
        l: [["w"], ["x", "y"]],
      })
    })

    it("rejects an object element whose fields all encode to nothing", () => {
      const items = env.object({ s: env.array(env.object({ tags: env.array(env.string()) })) })

      expect(() => encode(items, { s: [{ tags: [] }, { tags: ["x"] }] })).toThrow(
        expect.objectContaining({ path: "s[0]", found: "object" }),
      )
      expect(decode(items, encode(items, { s: [{ tags: ["a"] }, { tags: ["x"] }] }))).toEqual({
        s: [{ tags: ["a"] }, { tags: ["x"] }],
      })
    })

    it("rejects record keys that do not survive the case mapping", () => {
      const records = env.object({ r: env.record(env.string()) })

      expect(() => encode(records, { r: { Foo: "x" } })).toThrow(
        expect.objectContaining({ path: "r", found: '"Foo"' }),
      )
      expect(() => encode(records, { r: { "a-b": "x" } })).toThrow(EncodeError)
      expect(() => encode(records, { r: { a__b: "x" } })).toThrow(EncodeError)
      expect(decode(records, encode(records, { r: { foo_bar: "x", v2: "y" } }))).toEqual({
        r: { foo_bar: "x", v2: "y" },
      })
    })

    it("rejects a record entry that would encode to no keys", () => {
      const records = env.object({ r: env.record(env.object({ nick: env.optional(env.string()) })) })

      expect(() => encode(records, { r: { a: {} } })).toThrow(
        expect.objectContaining({ path: "r.a", found: "object" }),
      )
    })
  })
})
