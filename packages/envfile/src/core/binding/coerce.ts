import { DecodeError, EncodeError } from "../errors/errors"
import type { ScalarDescriptor } from "../schema/descriptors"
import { describeDescriptor } from "../schema/key-name"

const INTEGER = /^[+-]?\d+$/
const FLOAT = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?$/
const FLOAT_SPECIALS = new Set(["NaN", "Infinity", "+Infinity", "-Infinity"])
const TRUE_WORDS = new Set(["true", "1"])
const FALSE_WORDS = new Set(["false", "0"])

export type Scalar = string | number | bigint | boolean

/**
 * Turn a scalar leaf into the primitive its descriptor names.
 *
 * @throws DecodeError (`invalid_value`) when the text does not parse.
 */
export function coerce(descriptor: ScalarDescriptor, text: string, path: string): Scalar {
  const parsed = tryCoerce(descriptor, text)

  if (parsed === undefined) {
    throw new DecodeError("invalid_value", {
      path,
      expected: describeDescriptor(descriptor),
      found: JSON.stringify(text),
    })
  }

  return parsed
}

function tryCoerce(descriptor: ScalarDescriptor, text: string): Scalar | undefined {
  switch (descriptor.kind) {
    case "string":
      return text

    case "integer": {
      if (!INTEGER.test(text)) return undefined

      const n = Number(text)
      return Number.isSafeInteger(n) ? n : undefined
    }

    case "number":
      return FLOAT.test(text) || FLOAT_SPECIALS.has(text) ? Number(text) : undefined

    case "bigint":
      return INTEGER.test(text) ? BigInt(text.replace(/^\+/, "")) : undefined

    case "boolean": {
      const word = text.toLowerCase()
      if (TRUE_WORDS.has(word)) return true
      if (FALSE_WORDS.has(word)) return false
      return undefined
    }

    case "enum":
      return descriptor.values.find((v) => v === text)
  }
}

/**
 * Render a primitive as the scalar text {@link coerce} reads back.
 *
 * @throws EncodeError when `value` is not what the descriptor names.
 */
export function format(descriptor: ScalarDescriptor, value: unknown, path: string): string {
  const text = tryFormat(descriptor, value)

  if (text === undefined) {
    throw new EncodeError({
      path,
      expected: describeDescriptor(descriptor),
      found: describeValue(value),
    })
  }

  return text
}

function tryFormat(descriptor: ScalarDescriptor, value: unknown): string | undefined {
  switch (descriptor.kind) {
    case "string":
      return typeof value === "string" ? value : undefined
    case "integer":
      return typeof value === "number" && Number.isSafeInteger(value) ? String(value) : undefined
    case "number":
      return typeof value === "number" ? String(value) : undefined
    case "bigint":
      return typeof value === "bigint" ? value.toString() : undefined
    case "boolean":
      return typeof value === "boolean" ? String(value) : undefined
    case "enum":
      return descriptor.values.find((v) => v === value)
  }
}

/** Short description of a runtime value, e.g. `number 1.5` or `array`. */
export function describeValue(value: unknown): string {
  if (value === null) return "null"
  if (Array.isArray(value)) return "array"

  switch (typeof value) {
    case "string":
      return JSON.stringify(value)
    case "number":
    case "boolean":
      return `${typeof value} ${String(value)}`
    case "bigint":
      return `bigint ${value.toString()}`
    default:
      return typeof value
  }
}
