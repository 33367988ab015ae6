import type { Configuration, Environment } from "../../ports/configuration"
import type { ReadonlyVariableMap } from "../../ports/variables"
import { LookupError } from "../errors/lookup-error"

/**
 * @throws {LookupError} `environment_not_found` with the available names
 */
export function requireEnvironment(config: Configuration, name: string): Environment {
  const environment = config.environments.get(name)
  if (!environment) throw LookupError.environmentNotFound(name, environmentNames(config))

  return environment
}

/**
 * Variables of one environment of a resolved configuration, ready to be used
 * as the `default` source of a resolution.
 *
 * @example
 * ```typescript
 * const config = loadConfiguration()
 * const resolved = resolveVariables({
 *   sources: [defaults(environmentVariables(config, "dev")), processEnv(), overrides(cliPairs)],
 * })
 * ```
 */
export function environmentVariables(config: Configuration, name: string): ReadonlyVariableMap {
  return requireEnvironment(config, name).variables
}

export function environmentNames(config: Configuration): string[] {
  return [...config.environments.keys()].sort()
}
