/**
 * Field descriptors: the description of a structured type that the binding
 * layer walks to decode and encode it.
 *
 * @example
 * ```ts
 * const schema = env.object({
 *   port: env.integer(),
 *   databaseUrl: env.string({ key: "DB_URL" }),
 *   tags: env.array(env.string()),
 *   debug: env.optional(env.boolean()),
 * })
 *
 * type Config = Infer<typeof schema>
 * ```
 */

export type FieldOptions = {
  /** Explicit env key, used verbatim instead of the derived upper snake case name. */
  key?: string
}

export interface StringDescriptor {
  readonly kind: "string"
  readonly key?: string
}

export interface IntegerDescriptor {
  readonly kind: "integer"
  readonly key?: string
}

export interface NumberDescriptor {
  readonly kind: "number"
  readonly key?: string
}

export interface BigIntDescriptor {
  readonly kind: "bigint"
  readonly key?: string
}

export interface BooleanDescriptor {
  readonly kind: "boolean"
  readonly key?: string
}

export interface EnumDescriptor<V extends string = string> {
  readonly kind: "enum"
  readonly values: readonly V[]
  readonly key?: string
}

export interface ArrayDescriptor<I extends Descriptor = Descriptor> {
  readonly kind: "array"
  readonly item: I
  readonly key?: string
}

export interface RecordDescriptor<V extends Descriptor = Descriptor> {
  readonly kind: "record"
  readonly value: V
  readonly key?: string
}

export interface ObjectDescriptor<S extends Shape = Shape> {
  readonly kind: "object"
  readonly shape: S
  readonly key?: string
}

export interface OptionalDescriptor<I extends Descriptor = Descriptor> {
  readonly kind: "optional"
  readonly inner: I
  readonly key?: string
}

export interface DefaultDescriptor<I extends Descriptor = Descriptor, T = unknown> {
  readonly kind: "default"
  readonly inner: I
  readonly value: T
  readonly key?: string
}

export type ScalarDescriptor =
  | StringDescriptor
  | IntegerDescriptor
  | NumberDescriptor
  | BigIntDescriptor
  | BooleanDescriptor
  | EnumDescriptor

export type Descriptor =
  | ScalarDescriptor
  | ArrayDescriptor
  | RecordDescriptor
  | ObjectDescriptor
  | OptionalDescriptor
  | DefaultDescriptor

export type Shape = { readonly [field: string]: Descriptor }

type Simplify<T> = { [K in keyof T]: T[K] }

type OptionalFields<S> = {
  [K in keyof S]: S[K] extends OptionalDescriptor ? K : never
}[keyof S]

export type InferShape<S> = Simplify<
  { -readonly [K in Exclude<keyof S, OptionalFields<S>>]: Infer<S[K]> } & {
    -readonly [K in OptionalFields<S>]?: Infer<S[K]>
  }
>

/**
 * Static type a descriptor decodes to.
 */
export type Infer<D> = D extends OptionalDescriptor<infer I extends Descriptor>
  ? Infer<I> | undefined
  : D extends DefaultDescriptor<infer I extends Descriptor>
    ? Infer<I>
    : D extends ArrayDescriptor<infer I extends Descriptor>
      ? Infer<I>[]
      : D extends RecordDescriptor<infer V extends Descriptor>
        ? Record<string, Infer<V>>
        : D extends ObjectDescriptor<infer S extends Shape>
          ? InferShape<S>
          : D extends EnumDescriptor<infer V extends string>
            ? V
            : D extends StringDescriptor
              ? string
              : D extends IntegerDescriptor | NumberDescriptor
                ? number
                : D extends BigIntDescriptor
                  ? bigint
                  : D extends BooleanDescriptor
                    ? boolean
                    : never

function string(options: FieldOptions = {}): StringDescriptor {
  return { kind: "string", ...options }
}

/** Safe integer written in decimal, e.g. `8080`, `-1`. */
function integer(options: FieldOptions = {}): IntegerDescriptor {
  return { kind: "integer", ...options }
}

/** Decimal or exponent float, plus `Infinity`, `-Infinity` and `NaN`. */
function number(options: FieldOptions = {}): NumberDescriptor {
  return { kind: "number", ...options }
}

function bigint(options: FieldOptions = {}): BigIntDescriptor {
  return { kind: "bigint", ...options }
}

/** `true`/`false` in any case, or `1`/`0`. */
function boolean(options: FieldOptions = {}): BooleanDescriptor {
  return { kind: "boolean", ...options }
}

function enumOf<const V extends string>(
  values: readonly V[],
  options: FieldOptions = {},
): EnumDescriptor<V> {
  if (values.length === 0) throw new TypeError("env.enum() needs at least one value")

  return { kind: "enum", values, ...options }
}

/**
 * Sequence stored under index-suffixed keys: `KEY_0`, `KEY_1`, ... Reading
 * stops at the first missing index; no elements decodes to `[]`.
 */
function array<I extends Descriptor>(item: I, options: FieldOptions = {}): ArrayDescriptor<I> {
  return { kind: "array", item, ...options }
}

/**
 * Free-form nested map. Keys are uppercased on encode and lowercased on decode.
 */
function record<V extends Descriptor>(value: V, options: FieldOptions = {}): RecordDescriptor<V> {
  if (value.kind === "array" || value.kind === "optional") {
    throw new TypeError(`env.record() values cannot be ${value.kind} descriptors`)
  }

  return { kind: "record", value, ...options }
}

function object<S extends Shape>(shape: S, options: FieldOptions = {}): ObjectDescriptor<S> {
  return { kind: "object", shape, ...options }
}

function optional<I extends Descriptor>(
  inner: I,
  options: FieldOptions = {},
): OptionalDescriptor<I> {
  return { kind: "optional", inner, ...options }
}

function withDefault<I extends Descriptor>(
  inner: I,
  value: Infer<I>,
  options: FieldOptions = {},
): DefaultDescriptor<I, Infer<I>> {
  return { kind: "default", inner, value, ...options }
}

export const env = {
  string,
  integer,
  number,
  bigint,
  boolean,
  enum: enumOf,
  array,
  record,
  object,
  optional,
  withDefault,
}
