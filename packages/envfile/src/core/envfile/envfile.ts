import { createNullLogger, type Logger } from "@envweave/logger"
import { ProcessEnvironment } from "../../adapters/env/process-environment"
import { NodeFileSystem } from "../../adapters/fs/node-file-system"
import type { Environment } from "../../ports/environment"
import type { FileSystem } from "../../ports/file-system"
import { decode } from "../binding/decode"
import { encodeValue } from "../binding/encode"
import { parse } from "../codec/parse"
import { toFlatMapping } from "../codec/raw-entry"
import { serialize } from "../codec/serialize"
import { EncodeError, IoError } from "../errors/errors"
import { fromFlat, toFlat } from "../flatten/flatten"
import type { InferShape, ObjectDescriptor, Shape } from "../schema/descriptors"
import { ValueMap } from "../value/value-map"
import { type EnvfileOptions, type EnvfileOptionsInput, resolveOptions } from "./options"

export type EnvfileDeps = {
  /** @default NullLogger */
  logger?: Logger
  /** @default NodeFileSystem resolving from `process.cwd()` */
  fileSystem?: FileSystem
  /** @default ProcessEnvironment over `process.env` */
  environment?: Environment
}

export type Pairs = Iterable<readonly [string, string]>

/**
 * Reads and writes envfile text, env pairs and the process environment, as
 * schema-less {@link ValueMap}s or, given a descriptor schema, as typed data.
 *
 * @example
 * ```ts
 * const envfile = createEnvfile({}, { prefix: "APP_" })
 * const config = await envfile.fromFile(".env", env.object({ port: env.integer() }))
 * ```
 */
export class Envfile {
  readonly options: Readonly<EnvfileOptions>
  private readonly logger: Logger
  private readonly fileSystem: FileSystem
  private readonly environment: Environment

  constructor(deps: EnvfileDeps = {}, options: EnvfileOptionsInput = {}) {
    this.options = Object.freeze(resolveOptions(options))
    this.fileSystem = deps.fileSystem ?? new NodeFileSystem()
    this.environment = deps.environment ?? new ProcessEnvironment()
    this.logger = (deps.logger ?? createNullLogger()).child({
      separator: this.options.separator,
      ...(this.options.prefix === undefined ? {} : { prefix: this.options.prefix }),
    })
  }

  fromStr(text: string): ValueMap
  fromStr<S extends Shape>(text: string, schema: ObjectDescriptor<S>): InferShape<S>
  fromStr<S extends Shape>(text: string, schema?: ObjectDescriptor<S>): ValueMap | InferShape<S> {
    const logger = this.logger.child({ operation: "fromStr" })
    const entries = parse(text)

    logger.debug("Parsed envfile text", { entries: entries.length })

    return this.read(toFlatMapping(entries), logger, schema)
  }

  fromPairs(pairs: Pairs): ValueMap
  fromPairs<S extends Shape>(pairs: Pairs, schema: ObjectDescriptor<S>): InferShape<S>
  fromPairs<S extends Shape>(pairs: Pairs, schema?: ObjectDescriptor<S>): ValueMap | InferShape<S> {
    return this.read(pairs, this.logger.child({ operation: "fromPairs" }), schema)
  }

  toString(data: ValueMap): string
  toString<S extends Shape>(data: InferShape<S>, schema: ObjectDescriptor<S>): string
  toString<S extends Shape>(data?: ValueMap | InferShape<S>, schema?: ObjectDescriptor<S>): string {
    // String(envfile) and template literals call toString() with no arguments.
    if (data === undefined && schema === undefined) return "[object Envfile]"

    return this.write(data, this.logger.child({ operation: "toString" }), schema)
  }

  fromFile(path: string): Promise<ValueMap>
  fromFile<S extends Shape>(path: string, schema: ObjectDescriptor<S>): Promise<InferShape<S>>
  async fromFile<S extends Shape>(
    path: string,
    schema?: ObjectDescriptor<S>,
  ): Promise<ValueMap | InferShape<S>> {
    const logger = this.logger.child({ operation: "fromFile", file: path })
    let text: string

    try {
      text = await this.fileSystem.readText(path)
    } catch (err) {
      throw new IoError("read", path, err)
    }

    const entries = parse(text)
    logger.debug("Read envfile", { entries: entries.length })

    return this.read(toFlatMapping(entries), logger, schema)
  }

  toFile(path: string, data: ValueMap): Promise<void>
  toFile<S extends Shape>(
    path: string,
    data: InferShape<S>,
    schema: ObjectDescriptor<S>,
  ): Promise<void>
  async toFile<S extends Shape>(
    path: string,
    data: ValueMap | InferShape<S>,
    schema?: ObjectDescriptor<S>,
  ): Promise<void> {
    const logger = this.logger.child({ operation: "toFile", file: path })
    const text = this.write(data, logger, schema)

    try {
      await this.fileSystem.writeText(path, text)
    } catch (err) {
      throw new IoError("write", path, err)
    }
  }

  fromEnv(): ValueMap
  fromEnv<S extends Shape>(schema: ObjectDescriptor<S>): InferShape<S>
  fromEnv<S extends Shape>(schema?: ObjectDescriptor<S>): ValueMap | InferShape<S> {
    const logger = this.logger.child({ operation: "fromEnv" })
    const snapshot = this.environment.snapshot()

    logger.debug("Read process environment", { entries: Object.keys(snapshot).length })

    return this.read(Object.entries(snapshot), logger, schema)
  }

  private read<S extends Shape>(
    pairs: Pairs,
    logger: Logger,
    schema: ObjectDescriptor<S> | undefined,
  ): ValueMap | InferShape<S> {
    const { prefix, separator } = this.options
    const lowercase = schema === undefined && !this.options.preserveCase
    const kept: [string, string][] = []

    for (const [key, value] of pairs) {
      if (prefix !== undefined && !key.startsWith(prefix)) continue

      const name = prefix === undefined ? key : key.slice(prefix.length)
      if (name === "") continue

      kept.push([lowercase ? name.toLowerCase() : name, value])
    }

    const tree = fromFlat(kept, {
      separator,
      preserveOrder: schema !== undefined || this.options.preserveOrder,
      logger,
    })

    logger.debug("Built value map", { entries: kept.length })

    return schema === undefined ? tree : decode(schema, tree)
  }

  private write(data: unknown, logger: Logger, schema: ObjectDescriptor | undefined): string {
    const { prefix = "", separator } = this.options
    const uppercase = schema === undefined && !this.options.preserveCase
    let tree: ValueMap

    if (schema !== undefined) {
      tree = encodeValue(schema, data)
    } else if (data instanceof ValueMap) {
      tree = data
    } else {
      throw new EncodeError({ path: "(root)", expected: "ValueMap", found: typeof data })
    }

    const entries = [...toFlat(tree, { separator, logger })].map(([key, value]) => ({
      key: prefix + (uppercase ? key.toUpperCase() : key),
      value,
    }))

    logger.debug("Serialized envfile", { entries: entries.length })

    return serialize(entries)
  }
}

export function createEnvfile(deps: EnvfileDeps = {}, options: EnvfileOptionsInput = {}): Envfile {
  return new Envfile(deps, options)
}
