import { DecodeError } from "../errors/errors"
import type { Descriptor, InferShape, ObjectDescriptor, Shape } from "../schema/descriptors"
import { describeDescriptor, fieldKey } from "../schema/key-name"
import { ValueMap } from "../value/value-map"
import { coerce } from "./coerce"

/**
 * Decode a nested {@link ValueMap} into the structured type `schema`
 * describes.
 *
 * Field keys are matched exactly against the upper snake case (or
 * overridden) env keys, so the map is expected to keep the source casing.
 *
 * @throws DecodeError on a missing required field, a scalar that does not
 * parse, or a scalar where a map is needed (and the reverse).
 */
export function decode<S extends Shape>(schema: ObjectDescriptor<S>, value: ValueMap): InferShape<S> {
  // The walk below builds exactly the shape `S` describes.
  return decodeShape(schema.shape, value, "") as InferShape<S>
}

function decodeShape(shape: Shape, map: ValueMap, path: string): Record<string, unknown> {
  const out: Record<string, unknown> = {}

  for (const [field, descriptor] of Object.entries(shape)) {
    const decoded = decodeEntry(descriptor, map, fieldKey(field, descriptor), joinPath(path, field))

    if (decoded !== undefined) out[field] = decoded
  }

  return out
}

function decodeEntry(descriptor: Descriptor, parent: ValueMap, key: string, path: string): unknown {
  switch (descriptor.kind) {
    case "optional":
      return isPresent(descriptor.inner, parent, key)
        ? decodeEntry(descriptor.inner, parent, key, path)
        : undefined

    case "default":
      return isPresent(descriptor.inner, parent, key)
        ? decodeEntry(descriptor.inner, parent, key, path)
        : structuredClone(descriptor.value)

    case "array": {
      const items: unknown[] = []

      for (let i = 0; isPresent(descriptor.item, parent, indexKey(key, i)); i++) {
        items.push(decodeEntry(descriptor.item, parent, indexKey(key, i), `${path}[${i}]`))
      }

      return items
    }

    case "record": {
      const child = parent.get(key)
      if (child === undefined) return {}
      if (typeof child === "string") throw mismatch(descriptor, path, "scalar")

      const out: Record<string, unknown> = {}

      for (const name of child.keys()) {
        const field = name.toLowerCase()
        out[field] = decodeEntry(descriptor.value, child, name, joinPath(path, field))
      }

      return out
    }

    case "object": {
      const child = parent.get(key)
      if (typeof child === "string") throw mismatch(descriptor, path, "scalar")

      return decodeShape(descriptor.shape, child ?? new ValueMap(), path)
    }

    default: {
      const leaf = parent.get(key)

      if (leaf === undefined) {
        throw new DecodeError("missing_field", {
          path,
          expected: describeDescriptor(descriptor),
          found: "nothing",
        })
      }

      if (typeof leaf !== "string") throw mismatch(descriptor, path, "map")

      return coerce(descriptor, leaf, path)
    }
  }
}

/**
 * Whether anything is stored for `descriptor` under `key`. A sequence is
 * present when its first element is.
 */
export function isPresent(descriptor: Descriptor, parent: ValueMap, key: string): boolean {
  switch (descriptor.kind) {
    case "optional":
    case "default":
      return isPresent(descriptor.inner, parent, key)
    case "array":
      return isPresent(descriptor.item, parent, indexKey(key, 0))
    default:
      return parent.has(key)
  }
}

function mismatch(descriptor: Descriptor, path: string, found: string): DecodeError {
  return new DecodeError("type_mismatch", { path, expected: describeDescriptor(descriptor), found })
}

export function indexKey(key: string, index: number): string {
  return `${key}_${index}`
}

export function joinPath(parent: string, field: string): string {
  return parent === "" ? field : `${parent}.${field}`
}
