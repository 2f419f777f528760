import fs from "node:fs/promises"
import path from "node:path"
import type { FileSystem } from "../../ports/file-system"

export type NodeFileSystemOptions = {
  /**
   * Base directory for resolving relative paths.
   *
   * @default process.cwd()
   */
  cwd?: string
}

export class NodeFileSystem implements FileSystem {
  constructor(private readonly opts: NodeFileSystemOptions = {}) {}

  async readText(file: string): Promise<string> {
    return fs.readFile(this.resolve(file), "utf-8")
  }

  async writeText(file: string, text: string): Promise<void> {
    await fs.writeFile(this.resolve(file), text, "utf-8")
  }

  private resolve(file: string): string {
    return path.resolve(this.opts.cwd ?? process.cwd(), file)
  }
}
