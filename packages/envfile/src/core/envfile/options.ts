import { z } from "zod"
import { OptionsError } from "../errors/errors"
import { DEFAULT_SEPARATOR } from "../flatten/flatten"

export const envfileOptionsSchema = z.object({
  /**
   * Joins nested key segments. Only `_` and `.` characters; a single `_`
   * would split ordinary names like `DATABASE_URL`.
   */
  separator: z
    .string()
    .regex(/^[_.]+$/, "separator may only contain '_' and '.'")
    .refine((s) => s !== "_", "separator '_' would split ordinary key names")
    .default(DEFAULT_SEPARATOR),

  /** Key prefix, uppercased. Filtered and stripped on read, prepended on write. */
  prefix: z
    .string()
    .regex(/^[A-Za-z_][A-Za-z0-9_.]*$/, "prefix must be a valid env key")
    .transform((s) => s.toUpperCase())
    .optional(),

  /** Schema-less maps keep source order instead of sorting keys. */
  preserveOrder: z.boolean().default(false),

  /** Schema-less keys keep their case instead of lowercase in, uppercase out. */
  preserveCase: z.boolean().default(false),
})

export type EnvfileOptionsInput = z.input<typeof envfileOptionsSchema>
export type EnvfileOptions = z.output<typeof envfileOptionsSchema>

export function resolveOptions(input: EnvfileOptionsInput = {}): EnvfileOptions {
  const result = envfileOptionsSchema.safeParse(input)

  if (!result.success) {
    throw new OptionsError(`Invalid envfile options:\n${z.prettifyError(result.error)}`)
  }

  return result.data
}
