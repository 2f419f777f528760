export { ProcessEnvironment, type ProcessEnvironmentOptions } from "./adapters/env/process-environment"
export { MemoryFileSystem } from "./adapters/fs/memory-file-system"
export { NodeFileSystem, type NodeFileSystemOptions } from "./adapters/fs/node-file-system"
export { decode } from "./core/binding/decode"
export { encode, encodeValue } from "./core/binding/encode"
export { parse } from "./core/codec/parse"
export { isValidKey, KEY_PATTERN, type RawEntry, toFlatMapping } from "./core/codec/raw-entry"
export { formatValue, serialize } from "./core/codec/serialize"
export {
  fromEnv,
  fromFile,
  fromPairs,
  fromStr,
  prefixed,
  toFile,
  toString,
} from "./core/envfile/defaults"
export { createEnvfile, Envfile, type EnvfileDeps, type Pairs } from "./core/envfile/envfile"
export {
  type EnvfileOptions,
  type EnvfileOptionsInput,
  envfileOptionsSchema,
  resolveOptions,
} from "./core/envfile/options"
export {
  type EnvfileErrorOptions,
  EnvfileError,
  type ErrorCode,
  type ErrorContext,
  isEnvfileError,
  type SerializedCause,
  type SerializedError,
} from "./core/errors/envfile-error"
export {
  DecodeError,
  type DecodeErrorKind,
  EncodeError,
  FlattenError,
  type FlattenErrorKind,
  IoError,
  type IoOperation,
  type Mismatch,
  OptionsError,
  ParseError,
  type ParseErrorKind,
  type SourcePosition,
} from "./core/errors/errors"
export { DEFAULT_SEPARATOR, type FlattenOptions, fromFlat, splitKey, toFlat } from "./core/flatten/flatten"
export {
  type ArrayDescriptor,
  type BigIntDescriptor,
  type BooleanDescriptor,
  type DefaultDescriptor,
  type Descriptor,
  type EnumDescriptor,
  env,
  type FieldOptions,
  type Infer,
  type InferShape,
  type IntegerDescriptor,
  type NumberDescriptor,
  type ObjectDescriptor,
  type OptionalDescriptor,
  type RecordDescriptor,
  type ScalarDescriptor,
  type Shape,
  type StringDescriptor,
} from "./core/schema/descriptors"
export { toEnvKey } from "./core/schema/key-name"
export { isValueMap, type Value, ValueMap, type ValueMapOptions, type ValueObject } from "./core/value/value-map"
export type { Environment } from "./ports/environment"
export type { FileSystem } from "./ports/file-system"
