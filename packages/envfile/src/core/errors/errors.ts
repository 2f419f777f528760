import { EnvfileError } from "./envfile-error"

export type ParseErrorKind =
  | "missing_equals"
  | "invalid_key"
  | "unterminated_quote"
  | "invalid_escape"
  | "unexpected_content"

/** Position in the source text, both 1-based. */
export type SourcePosition = Readonly<{ line: number; column: number }>

/**
 * Malformed envfile text, or a key the format cannot represent.
 */
export class ParseError extends EnvfileError<"parse_error"> {
  readonly kind: ParseErrorKind
  readonly line: number
  readonly column: number

  constructor(kind: ParseErrorKind, message: string, position: SourcePosition) {
    super(`${message} (line ${position.line}, column ${position.column})`, {
      code: "parse_error",
      context: { kind, ...position },
    })

    this.kind = kind
    this.line = position.line
    this.column = position.column
  }
}

export type FlattenErrorKind = "non_scalar_leaf"

export class FlattenError extends EnvfileError<"flatten_error"> {
  readonly kind: FlattenErrorKind
  readonly path: string

  constructor(kind: FlattenErrorKind, path: string, message: string) {
    super(message, { code: "flatten_error", context: { kind, path } })

    this.kind = kind
    this.path = path
  }
}

export type DecodeErrorKind = "missing_field" | "invalid_value" | "type_mismatch"

export type Mismatch = Readonly<{
  /** Logical field path, e.g. `db.host` or `servers[0].port`. */
  path: string
  expected: string
  found: string
}>

export class DecodeError extends EnvfileError<"decode_error"> {
  readonly kind: DecodeErrorKind
  readonly path: string
  readonly expected: string
  readonly found: string

  constructor(kind: DecodeErrorKind, { path, expected, found }: Mismatch) {
    super(describeDecodeFailure(kind, { path, expected, found }), {
      code: "decode_error",
      context: { kind, path, expected, found },
    })

    this.kind = kind
    this.path = path
    this.expected = expected
    this.found = found
  }
}

function describeDecodeFailure(kind: DecodeErrorKind, m: Mismatch): string {
  switch (kind) {
    case "missing_field":
      return `Missing required field "${m.path}" (expected ${m.expected})`
    case "invalid_value":
      return `Invalid value for "${m.path}": expected ${m.expected}, found ${m.found}`
    case "type_mismatch":
      return `Type mismatch at "${m.path}": expected ${m.expected}, found ${m.found}`
  }
}

/**
 * Data handed to `encode` that does not match its schema.
 */
export class EncodeError extends EnvfileError<"encode_error"> {
  readonly path: string
  readonly expected: string
  readonly found: string

  constructor({ path, expected, found }: Mismatch) {
    super(`Cannot encode "${path}": expected ${expected}, found ${found}`, {
      code: "encode_error",
      context: { path, expected, found },
    })

    this.path = path
    this.expected = expected
    this.found = found
  }
}

export type IoOperation = "read" | "write"

/**
 * Failure of the file-system collaborator. The underlying error is kept as `cause`.
 */
export class IoError extends EnvfileError<"io_error"> {
  readonly path: string
  readonly operation: IoOperation

  constructor(operation: IoOperation, path: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause)

    super(`Failed to ${operation} ${path}: ${reason}`, {
      code: "io_error",
      context: { operation, path, ...errnoCode(cause) },
      cause,
    })

    this.path = path
    this.operation = operation
  }
}

function errnoCode(err: unknown): { errno?: string } {
  if (typeof err !== "object" || err === null || !("code" in err)) return {}

  return typeof err.code === "string" ? { errno: err.code } : {}
}

export class OptionsError extends EnvfileError<"options_error"> {
  constructor(message: string) {
    super(message, { code: "options_error" })
  }
}
