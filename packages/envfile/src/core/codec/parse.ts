import { ParseError, type SourcePosition } from "../errors/errors"
import { isValidKey, type RawEntry } from "./raw-entry"
import { Scanner } from "./scanner"

const EXPORT_KEYWORD = /^export\s+/

const ESCAPES: Readonly<Record<string, string>> = {
  n: "\n",
  r: "\r",
  t: "\t",
  '"': '"',
  "\\": "\\",
}

/**
 * Parse envfile text into its assignments, in source order.
 *
 * Duplicates are kept; fold them with {@link toFlatMapping} for
 * last-one-wins semantics.
 *
 * @throws ParseError on a line without `=`, an invalid key, an unterminated
 * quote, an unknown escape, or content after a closing quote.
 */
export function parse(text: string): RawEntry[] {
  const scanner = new Scanner(text)
  const entries: RawEntry[] = []

  while (!scanner.done) {
    scanner.skipInlineWhitespace()

    if (scanner.atLineEnd() || scanner.peek() === "#") {
      scanner.skipLine()
      continue
    }

    entries.push(parseAssignment(scanner))
  }

  return entries
}

function parseAssignment(scanner: Scanner): RawEntry {
  const start = scanner.position()
  const lhs = scanner.readUntil("=")

  if (scanner.peek() !== "=") {
    throw new ParseError("missing_equals", `Expected "=" after "${lhs.trim()}"`, start)
  }

  const key = lhs.trim().replace(EXPORT_KEYWORD, "")
  if (!isValidKey(key)) {
    throw new ParseError("invalid_key", `Invalid key "${key}"`, start)
  }

  scanner.next()
  scanner.skipInlineWhitespace()

  const value = parseValue(scanner)
  scanner.next()

  return { key, value }
}

function parseValue(scanner: Scanner): string {
  const quote = scanner.peek()

  if (quote !== "'" && quote !== '"') {
    return scanner.readUntil().trim()
  }

  const opening = scanner.position()
  scanner.next()

  const value = quote === "'" ? readSingleQuoted(scanner, opening) : readDoubleQuoted(scanner, opening)

  scanner.skipInlineWhitespace()

  if (scanner.peek() === "#") {
    scanner.readUntil()
  } else if (!scanner.atLineEnd()) {
    throw new ParseError(
      "unexpected_content",
      `Unexpected "${scanner.peek()}" after closing quote`,
      scanner.position(),
    )
  }

  return value
}

function readSingleQuoted(scanner: Scanner, opening: SourcePosition): string {
  let value = ""

  for (let ch = scanner.next(); ch !== "'"; ch = scanner.next()) {
    if (ch === undefined) throw unterminated(opening)
    value += ch
  }

  return value
}

function readDoubleQuoted(scanner: Scanner, opening: SourcePosition): string {
  let value = ""

  for (;;) {
    const at = scanner.position()
    const ch = scanner.next()

    if (ch === undefined) throw unterminated(opening)
    if (ch === '"') return value

    if (ch !== "\\") {
      value += ch
      continue
    }

    const escaped = scanner.next()
    if (escaped === undefined) throw unterminated(opening)

    const replacement = ESCAPES[escaped]
    if (replacement === undefined) {
      throw new ParseError("invalid_escape", `Invalid escape sequence "\\${escaped}"`, at)
    }

    value += replacement
  }
}

function unterminated(opening: SourcePosition): ParseError {
  return new ParseError("unterminated_quote", "Unterminated quoted value", opening)
}
