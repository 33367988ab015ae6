import type { EnvSnapshot, ReadonlyVariableMap, VariableMap } from "../../ports/variables"
import { ConfigError, type InterpolationFailure } from "../errors/config-error"
import { PLACEHOLDER_CLOSE, PLACEHOLDER_OPEN } from "../expansion/placeholders"
import { isEncrypted } from "../secrets/encrypted-values"

/**
 * Substitutes `${NAME}` from the process environment only.
 *
 * Unlike expansion, nothing is lenient here: an unset name, an unterminated
 * placeholder and an empty name all fail.
 *
 * @param field - Dotted location of the value, used in errors
 * @throws {ConfigError} `interpolation_error`
 */
export function interpolate(value: string, env: EnvSnapshot, field: string): string {
  let out = ""
  let cursor = 0

  for (;;) {
    const start = value.indexOf(PLACEHOLDER_OPEN, cursor)
    if (start === -1) break

    const end = value.indexOf(PLACEHOLDER_CLOSE, start + PLACEHOLDER_OPEN.length)
    if (end === -1) throw failure("unterminated", "", field, start)

    const name = value.slice(start + PLACEHOLDER_OPEN.length, end)
    if (name === "") throw failure("empty_name", "", field, start)

    const replacement = Object.hasOwn(env, name) ? env[name] : undefined
    if (replacement === undefined) throw failure("undefined", name, field, start)

    out += value.slice(cursor, start) + replacement
    cursor = end + PLACEHOLDER_CLOSE.length
  }

  return out + value.slice(cursor)
}

/**
 * Interpolates every value of a mapping; encrypted values are kept as they are.
 *
 * @param scope - Dotted prefix of the mapping, e.g. `environments.dev`
 */
export function interpolateVariables(
  variables: ReadonlyVariableMap,
  env: EnvSnapshot,
  scope: string,
): VariableMap {
  const interpolated: VariableMap = new Map()

  for (const [key, value] of variables) {
    interpolated.set(key, isEncrypted(value) ? value : interpolate(value, env, `${scope}.${key}`))
  }

  return interpolated
}

function failure(
  reason: InterpolationFailure,
  variable: string,
  field: string,
  position: number,
): ConfigError {
  return new ConfigError({ kind: "interpolation_error", reason, variable, field, position })
}
