import type { SourcePosition } from "../errors/errors"

const INLINE_WHITESPACE = new Set([" ", "\t", "\r", "\f", "\v"])

/**
 * Cursor over envfile text that tracks 1-based line and column.
 */
export class Scanner {
  private offset = 0
  private line = 1
  private column = 1

  constructor(private readonly text: string) {}

  get done(): boolean {
    return this.offset >= this.text.length
  }

  peek(): string | undefined {
    return this.text[this.offset]
  }

  next(): string | undefined {
    const ch = this.text[this.offset]
    if (ch === undefined) return undefined

    this.offset++

    if (ch === "\n") {
      this.line++
      this.column = 1
    } else {
      this.column++
    }

    return ch
  }

  position(): SourcePosition {
    return { line: this.line, column: this.column }
  }

  atLineEnd(): boolean {
    return this.done || this.peek() === "\n"
  }

  skipInlineWhitespace(): void {
    while (!this.done && INLINE_WHITESPACE.has(this.peek() ?? "")) {
      this.next()
    }
  }

  /** Reads up to (not including) the next newline or `stop` character. */
  readUntil(stop?: string): string {
    const start = this.offset

    while (!this.atLineEnd() && this.peek() !== stop) {
      this.next()
    }

    return this.text.slice(start, this.offset)
  }

  /** Skips the rest of the current line, newline included. */
  skipLine(): void {
    this.readUntil()
    this.next()
  }
}
