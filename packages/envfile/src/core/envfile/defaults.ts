import { Envfile, type EnvfileDeps } from "./envfile"
import type { EnvfileOptionsInput } from "./options"

const defaultEnvfile = new Envfile()

/** {@link Envfile.fromStr} with default options. */
export const fromStr: Envfile["fromStr"] = defaultEnvfile.fromStr.bind(defaultEnvfile)
export const fromPairs: Envfile["fromPairs"] = defaultEnvfile.fromPairs.bind(defaultEnvfile)
export const toString: Envfile["toString"] = defaultEnvfile.toString.bind(defaultEnvfile)
export const fromFile: Envfile["fromFile"] = defaultEnvfile.fromFile.bind(defaultEnvfile)
export const toFile: Envfile["toFile"] = defaultEnvfile.toFile.bind(defaultEnvfile)
export const fromEnv: Envfile["fromEnv"] = defaultEnvfile.fromEnv.bind(defaultEnvfile)

/**
 * An {@link Envfile} that only sees keys starting with `prefix` (uppercased)
 * and writes every key with it.
 *
 * @example
 * ```ts
 * // APP_PORT=8080 → { port: 8080 }
 * prefixed("APP_").fromEnv(env.object({ port: env.integer() }))
 * ```
 */
export function prefixed(
  prefix: string,
  deps: EnvfileDeps = {},
  options: Omit<EnvfileOptionsInput, "prefix"> = {},
): Envfile {
  return new Envfile(deps, { ...options, prefix })
}
