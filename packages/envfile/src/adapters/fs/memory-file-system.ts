import type { FileSystem } from "../../ports/file-system"

/**
 * In-memory {@link FileSystem}, for tests and for callers that keep envfiles
 * somewhere other than disk.
 */
export class MemoryFileSystem implements FileSystem {
  private readonly files: Map<string, string>

  constructor(files: Record<string, string> = {}) {
    this.files = new Map(Object.entries(files))
  }

  async readText(path: string): Promise<string> {
    const text = this.files.get(path)

    if (text === undefined) {
      throw Object.assign(new Error(`ENOENT: no such file, open '${path}'`), {
        code: "ENOENT",
        path,
      })
    }

    return text
  }

  async writeText(path: string, text: string): Promise<void> {
    this.files.set(path, text)
  }

  /** Every stored file, keyed by path. */
  dump(): Record<string, string> {
    return Object.fromEntries(this.files)
  }
}
