import { ParseError } from "../errors/errors"
import { isValidKey, type RawEntry } from "./raw-entry"

const NEEDS_QUOTES = /[\s#='"\\]/

const QUOTED_ESCAPES: Readonly<Record<string, string>> = {
  "\\": "\\\\",
  '"': '\\"',
  "\n": "\\n",
  "\r": "\\r",
}

/**
 * Render a value so that {@link parse} reads it back unchanged: bare when
 * that is unambiguous, double-quoted otherwise.
 */
export function formatValue(value: string): string {
  if (!NEEDS_QUOTES.test(value)) return value

  return `"${value.replace(/[\\"\n\r]/g, (ch) => QUOTED_ESCAPES[ch] ?? ch)}"`
}

/**
 * Serialize entries as `KEY=VALUE` lines joined by `\n`, without a trailing
 * newline.
 *
 * @throws ParseError (`invalid_key`) for a key the format cannot represent.
 */
export function serialize(entries: Iterable<RawEntry>): string {
  const lines: string[] = []

  for (const { key, value } of entries) {
    if (!isValidKey(key)) {
      throw new ParseError("invalid_key", `Cannot serialize invalid key "${key}"`, {
        line: lines.length + 1,
        column: 1,
      })
    }

    lines.push(`${key}=${formatValue(value)}`)
  }

  return lines.join("\n")
}
