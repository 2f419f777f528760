import { createNullLogger, type Logger } from "@envweave/logger"
import { FlattenError } from "../errors/errors"
import { isValueMap, ValueMap } from "../value/value-map"

export const DEFAULT_SEPARATOR = "__"

export type FlattenOptions = {
  /** Joins nested key segments. @default "__" */
  separator?: string
  /** Ordering mode of the maps `fromFlat` builds. @default false */
  preserveOrder?: boolean
  /** Receives a warning whenever a later entry replaces an earlier one. */
  logger?: Logger
}

/**
 * Split a flat key into path segments. A key whose split would yield an
 * empty segment (leading, trailing or doubled separator) stays whole.
 */
export function splitKey(key: string, separator: string = DEFAULT_SEPARATOR): string[] {
  const segments = key.split(separator)

  return segments.some((s) => s === "") ? [key] : segments
}

/**
 * Build a nested {@link ValueMap} from flat `KEY=VALUE` pairs by splitting
 * keys on the separator.
 *
 * When a path needs a map where a scalar sits (or the reverse) the later
 * entry wins; the replacement is logged, not thrown.
 *
 * @remarks
 * Keys that contain the separator literal are nested on the way in and do
 * not come back out unchanged.
 */
export function fromFlat(
  mapping: Iterable<readonly [string, string]>,
  options: FlattenOptions = {},
): ValueMap {
  const separator = options.separator ?? DEFAULT_SEPARATOR
  const preserveOrder = options.preserveOrder ?? false
  const logger = options.logger ?? createNullLogger()
  const root = new ValueMap({ preserveOrder })

  for (const [key, scalar] of mapping) {
    const segments = splitKey(key, separator)
    const leaf = segments.pop() ?? key
    let node = root

    for (const [depth, segment] of segments.entries()) {
      const existing = node.get(segment)

      if (isValueMap(existing)) {
        node = existing
        continue
      }

      if (existing !== undefined) {
        logger.warn("Nested key replaces an earlier scalar", {
          key,
          path: segments.slice(0, depth + 1).join(separator),
        })
      }

      const child = new ValueMap({ preserveOrder })
      node.insert(segment, child)
      node = child
    }

    const previous = node.insert(leaf, scalar)

    if (previous !== undefined) {
      logger.warn("Key replaces an earlier value at the same path", { key, path: key })
    }
  }

  return root
}

/**
 * Flatten a {@link ValueMap} into `KEY=VALUE` pairs, joining nested keys with
 * the separator, in the map's iteration order.
 *
 * @throws FlattenError (`non_scalar_leaf`) for an empty nested map, which has
 * no flat representation.
 */
export function toFlat(value: ValueMap, options: FlattenOptions = {}): Map<string, string> {
  const separator = options.separator ?? DEFAULT_SEPARATOR
  const logger = options.logger ?? createNullLogger()
  const out = new Map<string, string>()

  const walk = (map: ValueMap, prefix: readonly string[]): void => {
    for (const [key, child] of map) {
      const path = [...prefix, key]

      if (typeof child === "string") {
        const flatKey = path.join(separator)

        if (out.has(flatKey)) {
          logger.warn("Flattened keys collide; the later entry wins", { key: flatKey })
        }

        out.set(flatKey, child)
        continue
      }

      if (child.size === 0) {
        throw new FlattenError(
          "non_scalar_leaf",
          path.join(separator),
          `Empty map at "${path.join(separator)}" cannot be flattened to a scalar`,
        )
      }

      walk(child, path)
    }
  }

  walk(value, [])

  return out
}
