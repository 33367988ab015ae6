import type { Configuration, Environment } from "../../ports/configuration"
import type { EnvSnapshot, ReadonlyVariableMap } from "../../ports/variables"
import { foldExtends } from "./extends-graph"
import { interpolate, interpolateVariables } from "./interpolate"

export type ResolveInheritanceOptions = {
  /**
   * Process environment used for interpolation.
   *
   * @default process.env
   */
  env?: EnvSnapshot
}

/**
 * Resolves `extends` and `common`, then interpolates from the process
 * environment.
 *
 * For an environment with ancestors `[root, …, parent]` the resolved
 * variables are `common ∪ root ∪ … ∪ parent ∪ own`, later operands winning.
 * `color` and `requiresConfirmation` are inherited when unset; `description`
 * never is.
 *
 * @throws {ConfigError} `circular_reference`, `invalid_environment` or
 *   `interpolation_error`; nothing is returned on failure
 */
export function resolveInheritance(
  config: Configuration,
  options: ResolveInheritanceOptions = {},
): Configuration {
  const env = options.env ?? process.env
  const common: ReadonlyVariableMap = config.common ?? new Map()

  const inherited = foldExtends<Environment>(config.environments, (environment, parent) =>
    inherit(environment, parent, common),
  )

  const environments = new Map<string, Environment>()
  for (const [name, environment] of inherited) {
    environments.set(name, interpolateEnvironment(environment, env))
  }

  return {
    ...config,
    ...(config.common && { common: interpolateVariables(config.common, env, "common") }),
    environments,
  }
}

function inherit(
  environment: Environment,
  parent: Environment | undefined,
  common: ReadonlyVariableMap,
): Environment {
  const base = parent?.variables ?? common
  const color = environment.color ?? parent?.color
  const requiresConfirmation = environment.requiresConfirmation ?? parent?.requiresConfirmation

  return {
    ...environment,
    variables: new Map([...base, ...environment.variables]),
    ...(color !== undefined && { color }),
    ...(requiresConfirmation !== undefined && { requiresConfirmation }),
  }
}

function interpolateEnvironment(environment: Environment, env: EnvSnapshot): Environment {
  const scope = `environments.${environment.name}`

  return {
    ...environment,
    description: interpolate(environment.description, env, `${scope}.description`),
    variables: interpolateVariables(environment.variables, env, scope),
  }
}
