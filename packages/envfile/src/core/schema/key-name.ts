import type { Descriptor } from "./descriptors"

/**
 * Convert a logical field name to its env key: upper snake case.
 *
 * @example
 * toEnvKey("hello")       // "HELLO"
 * toEnvKey("databaseUrl") // "DATABASE_URL"
 * toEnvKey("HTTPServer")  // "HTTP_SERVER"
 */
export function toEnvKey(field: string): string {
  return field
    .replace(/([a-z0-9])([A-Z])/g, "$1_$2")
    .replace(/([A-Z]+)([A-Z][a-z])/g, "$1_$2")
    .replace(/[^A-Za-z0-9_]+/g, "_")
    .toUpperCase()
}

/**
 * The env key of a field: its explicit override (on the descriptor or on the
 * descriptor an optional/default wraps), else the derived name.
 */
export function fieldKey(field: string, descriptor: Descriptor): string {
  return keyOverride(descriptor) ?? toEnvKey(field)
}

function keyOverride(descriptor: Descriptor): string | undefined {
  if (descriptor.key !== undefined) return descriptor.key

  if (descriptor.kind === "optional" || descriptor.kind === "default") {
    return keyOverride(descriptor.inner)
  }

  return undefined
}

/**
 * Human-readable name of what a descriptor expects, for error messages.
 */
export function describeDescriptor(descriptor: Descriptor): string {
  switch (descriptor.kind) {
    case "enum":
      return `one of ${descriptor.values.map((v) => JSON.stringify(v)).join(" | ")}`
    case "record":
    case "object":
      return "map"
    case "optional":
    case "default":
      return describeDescriptor(descriptor.inner)
    default:
      return descriptor.kind
  }
}
