/**
 * A configuration value: a scalar string leaf or a nested map.
 *
 * Scalars are never pre-parsed; `"8080"` stays a string until a schema
 * coerces it.
 */
export type Value = string | ValueMap

export type ValueMapOptions = {
  /**
   * Iterate in first-insertion order instead of ascending key order.
   * Fixed at construction.
   * @default false
   */
  preserveOrder?: boolean
}

/**
 * Plain-object rendering of a {@link ValueMap}, as produced by `toJSON()`.
 */
export type ValueObject = { [key: string]: string | ValueObject }

/**
 * String-keyed map of {@link Value}s with a construction-time ordering mode.
 *
 * - order-preserving: iteration follows first-insertion order; re-inserting
 *   an existing key keeps its position
 * - canonical (default): iteration is in ascending key order
 *
 * Equality ({@link ValueMap.equals}) ignores order in both modes.
 */
export class ValueMap implements Iterable<[string, Value]> {
  readonly preserveOrder: boolean
  private readonly items = new Map<string, Value>()

  constructor(options: ValueMapOptions = {}) {
    this.preserveOrder = options.preserveOrder ?? false
  }

  static fromEntries(
    entries: Iterable<readonly [string, Value]>,
    options: ValueMapOptions = {},
  ): ValueMap {
    const map = new ValueMap(options)

    for (const [key, value] of entries) {
      map.insert(key, value)
    }

    return map
  }

  get size(): number {
    return this.items.size
  }

  /**
   * Insert or replace `key`.
   *
   * @returns The value previously stored under `key`, if any.
   * @throws TypeError when `key` is the empty string.
   */
  insert(key: string, value: Value): Value | undefined {
    if (key === "") {
      throw new TypeError("ValueMap keys must not be empty")
    }

    const previous = this.items.get(key)
    this.items.set(key, value)

    return previous
  }

  get(key: string): Value | undefined {
    return this.items.get(key)
  }

  has(key: string): boolean {
    return this.items.has(key)
  }

  delete(key: string): boolean {
    return this.items.delete(key)
  }

  keys(): string[] {
    const keys = [...this.items.keys()]

    return this.preserveOrder ? keys : keys.sort(compareKeys)
  }

  values(): Value[] {
    return this.entries().map(([, value]) => value)
  }

  entries(): [string, Value][] {
    const entries = [...this.items.entries()]

    return this.preserveOrder ? entries : entries.sort(([a], [b]) => compareKeys(a, b))
  }

  [Symbol.iterator](): Iterator<[string, Value]> {
    return this.entries()[Symbol.iterator]()
  }

  /**
   * Structural equality, ignoring iteration order and ordering mode.
   */
  equals(other: ValueMap): boolean {
    if (this.size !== other.size) return false

    for (const [key, value] of this.items) {
      const theirs = other.get(key)

      if (theirs === undefined || !valuesEqual(value, theirs)) return false
    }

    return true
  }

  /**
   * Structural equality that also compares iteration order at every level.
   */
  sameOrder(other: ValueMap): boolean {
    const mine = this.entries()
    const theirs = other.entries()

    if (mine.length !== theirs.length) return false

    return mine.every(([key, value], i) => {
      const other = theirs[i]
      if (other === undefined || other[0] !== key) return false

      const otherValue = other[1]

      if (typeof value === "string" || typeof otherValue === "string") {
        return value === otherValue
      }

      return value.sameOrder(otherValue)
    })
  }

  toJSON(): ValueObject {
    const out: ValueObject = {}

    for (const [key, value] of this.entries()) {
      out[key] = typeof value === "string" ? value : value.toJSON()
    }

    return out
  }
}

export function isValueMap(value: Value | undefined): value is ValueMap {
  return value instanceof ValueMap
}

function valuesEqual(a: Value, b: Value): boolean {
  if (typeof a === "string" || typeof b === "string") return a === b

  return a.equals(b)
}

function compareKeys(a: string, b: string): number {
  if (a === b) return 0

  return a < b ? -1 : 1
}
