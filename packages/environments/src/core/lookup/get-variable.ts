import type { Configuration } from "../../ports/configuration"
import { LookupError } from "../errors/lookup-error"
import { type DecryptOptions, decryptValue } from "../secrets/secret-values"
import { requireEnvironment } from "./environment-variables"

/**
 * Looks up one variable of a resolved configuration, decrypting it when it
 * is marked encrypted.
 *
 * @throws {LookupError} `environment_not_found` or `variable_not_found`
 * @throws {SecretError} when the value is encrypted and cannot be decrypted
 */
export function getVariable(
  config: Configuration,
  environment: string,
  key: string,
  secrets: DecryptOptions = {},
): string {
  const value = requireEnvironment(config, environment).variables.get(key)
  if (value === undefined) throw LookupError.variableNotFound(environment, key)

  return decryptValue(key, value, secrets)
}
