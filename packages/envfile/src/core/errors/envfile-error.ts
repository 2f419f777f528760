export type ErrorCode = Lowercase<string>

/**
 * Structured metadata attached to errors (paths, line numbers, keys).
 */
export type ErrorContext = Readonly<Record<string, unknown>>

export type EnvfileErrorOptions<C extends ErrorCode = ErrorCode> = Readonly<{
  code: C
  context?: ErrorContext
  cause?: unknown
}>

/**
 * JSON shape of an {@link EnvfileError}, as produced by `JSON.stringify(err)`.
 */
export type SerializedError = Readonly<{
  name: string
  code: string
  message: string
  context: Record<string, unknown>
  timestamp: string
  cause?: SerializedError | SerializedCause
}>

/** A cause raised outside this library, such as a file-system error. */
export type SerializedCause = Readonly<{
  name: string
  message: string
}>

/**
 * Base class of every error raised by envfile operations.
 *
 * Errors are terminal for the call that raised them: no partial result is
 * returned alongside, and nothing is retried.
 */
export class EnvfileError<C extends ErrorCode = ErrorCode> extends Error {
  readonly code: C
  readonly context: ErrorContext
  readonly timestamp: Date

  constructor(message: string, options: EnvfileErrorOptions<C>) {
    super(message, { cause: options.cause })

    this.name = new.target.name
    this.code = options.code
    this.context = Object.freeze({ ...options.context })
    this.timestamp = new Date()

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target)
    }
  }

  toJSON(): SerializedError {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      context: { ...this.context },
      timestamp: this.timestamp.toISOString(),
      ...(this.cause !== undefined && { cause: serializeCause(this.cause) }),
    }
  }
}

/**
 * Type guard for errors raised by this library.
 *
 * @example
 * ```ts
 * try {
 *   fromStr(text, schema)
 * } catch (err) {
 *   if (isEnvfileError(err)) console.error(err.code, err.context)
 * }
 * ```
 */
export function isEnvfileError(err: unknown): err is EnvfileError {
  return err instanceof EnvfileError
}

function serializeCause(cause: unknown): SerializedError | SerializedCause {
  if (cause instanceof EnvfileError) return cause.toJSON()
  if (cause instanceof Error) return { name: cause.name, message: cause.message }

  return { name: "NonErrorThrown", message: String(cause) }
}
