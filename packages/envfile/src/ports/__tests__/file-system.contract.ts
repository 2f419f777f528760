import type { FileSystem } from "../file-system"

export type FileSystemHarness = {
  name: string
  make: () => Promise<{
    fileSystem: FileSystem
    /** A path inside the file system that does not exist yet. */
    path: (name: string) => string
    cleanup?: () => Promise<void>
  }>
}

export function describeFileSystemContract(h: FileSystemHarness) {
  describe(`${h.name} (FileSystem contract)`, () => {
    let fileSystem: FileSystem
    let path: (name: string) => string
    let cleanup: (() => Promise<void>) | undefined

    beforeEach(async () => {
      const result = await h.make()

      fileSystem = result.fileSystem
      path = result.path
      cleanup = result.cleanup
    })

    afterEach(async () => {
      await cleanup?.()
    })

    it("reads back what it wrote", async () => {
      await fileSystem.writeText(path(".env"), "A=1\nB=2")

      await expect(fileSystem.readText(path(".env"))).resolves.toBe("A=1\nB=2")
    })

    it("writeText() replaces existing content", async () => {
      await fileSystem.writeText(path(".env"), "A=1\nB=2")
      await fileSystem.writeText(path(".env"), "C=3")

      await expect(fileSystem.readText(path(".env"))).resolves.toBe("C=3")
    })

    it("round-trips non-ASCII text", async () => {
      await fileSystem.writeText(path(".env"), 'GREETING="héllo wörld ✓"')

      await expect(fileSystem.readText(path(".env"))).resolves.toBe('GREETING="héllo wörld ✓"')
    })

    it("readText() rejects with ENOENT for a missing file", async () => {
      await expect(fileSystem.readText(path("missing.env"))).rejects.toMatchObject({
        code: "ENOENT",
      })
    })
  })
}
