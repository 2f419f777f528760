/**
 * Where envfiles are read from and written to.
 *
 * Implementations reject with the underlying error (e.g. an `ENOENT` errno
 * error for a missing file); the envfile layer wraps it in an `IoError`.
 */
export interface FileSystem {
  /** Read a whole file as UTF-8 text. */
  readText(path: string): Promise<string>

  /** Create or truncate `path` and write `text` as UTF-8. */
  writeText(path: string, text: string): Promise<void>
}
