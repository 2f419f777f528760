/**
 * One `KEY=VALUE` assignment after quote and escape resolution.
 */
export type RawEntry = Readonly<{
  key: string
  value: string
}>

/**
 * Letters, digits, `_` and `.`; never a leading digit. The `.` keeps
 * dot-separated nested keys (`DB.HOST`) representable.
 */
export const KEY_PATTERN = /^[A-Za-z_][A-Za-z0-9_.]*$/

export function isValidKey(key: string): boolean {
  return KEY_PATTERN.test(key)
}

/**
 * Fold entries into a mapping. Duplicate keys: the last value wins, the key
 * keeps the position of its first occurrence.
 */
export function toFlatMapping(entries: Iterable<RawEntry>): Map<string, string> {
  const mapping = new Map<string, string>()

  for (const { key, value } of entries) {
    mapping.set(key, value)
  }

  return mapping
}
