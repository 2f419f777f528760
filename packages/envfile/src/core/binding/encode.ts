import { EncodeError } from "../errors/errors"
import type { Descriptor, InferShape, ObjectDescriptor, Shape } from "../schema/descriptors"
import { fieldKey } from "../schema/key-name"
import { ValueMap } from "../value/value-map"
import { describeValue, format } from "./coerce"
import { indexKey, isPresent, joinPath } from "./decode"

/**
 * Record keys are uppercased into env keys and lowercased back, so only
 * lowercase names survive the trip. `__` would split under the default
 * separator.
 */
const RECORD_KEY = /^[a-z_][a-z0-9_]*$/

/**
 * Encode structured data into an order-preserving {@link ValueMap}, fields in
 * schema declaration order.
 *
 * Unset optionals, empty sequences and empty maps produce no keys. A
 * sequence element that would produce none is rejected, since decoding
 * stops at the first missing index.
 *
 * @throws EncodeError when `data` does not match `schema`.
 */
export function encode<S extends Shape>(schema: ObjectDescriptor<S>, data: InferShape<S>): ValueMap {
  return encodeValue(schema, data)
}

/**
 * {@link encode} for data whose static type is not known to match `schema`.
 */
export function encodeValue(schema: ObjectDescriptor, data: unknown): ValueMap {
  const out = new ValueMap({ preserveOrder: true })
  encodeShape(schema.shape, data, out, "")

  return out
}

function encodeShape(shape: Shape, data: unknown, target: ValueMap, path: string): void {
  if (!isRecord(data)) {
    throw new EncodeError({ path: path || "(root)", expected: "object", found: describeValue(data) })
  }

  for (const [field, descriptor] of Object.entries(shape)) {
    encodeEntry(descriptor, data[field], target, fieldKey(field, descriptor), joinPath(path, field))
  }
}

function encodeEntry(
  descriptor: Descriptor,
  value: unknown,
  target: ValueMap,
  key: string,
  path: string,
): void {
  switch (descriptor.kind) {
    case "optional":
      if (value !== undefined) encodeEntry(descriptor.inner, value, target, key, path)
      return

    case "default":
      encodeEntry(descriptor.inner, value ?? descriptor.value, target, key, path)
      return

    case "array":
      if (!Array.isArray(value)) {
        throw new EncodeError({ path, expected: "array", found: describeValue(value) })
      }

      value.forEach((item: unknown, i) => {
        const itemPath = `${path}[${i}]`
        encodeEntry(descriptor.item, item, target, indexKey(key, i), itemPath)

        if (!isPresent(descriptor.item, target, indexKey(key, i))) {
          throw new EncodeError({
            path: itemPath,
            expected: "an element that encodes to at least one key",
            found: describeValue(item),
          })
        }
      })
      return

    case "record": {
      if (!isRecord(value)) {
        throw new EncodeError({ path, expected: "map", found: describeValue(value) })
      }

      const child = new ValueMap({ preserveOrder: true })

      for (const [name, item] of Object.entries(value)) {
        if (!RECORD_KEY.test(name) || name.includes("__")) {
          throw new EncodeError({
            path,
            expected: "lowercase record keys of letters, digits and single underscores",
            found: JSON.stringify(name),
          })
        }

        encodeEntry(descriptor.value, item, child, name.toUpperCase(), joinPath(path, name))

        if (!isPresent(descriptor.value, child, name.toUpperCase())) {
          throw new EncodeError({
            path: joinPath(path, name),
            expected: "an entry that encodes to at least one key",
            found: describeValue(item),
          })
        }
      }

      if (child.size > 0) target.insert(key, child)
      return
    }

    case "object": {
      const child = new ValueMap({ preserveOrder: true })
      encodeShape(descriptor.shape, value, child, path)

      if (child.size > 0) target.insert(key, child)
      return
    }

    default:
      target.insert(key, format(descriptor, value, path))
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value)
}
