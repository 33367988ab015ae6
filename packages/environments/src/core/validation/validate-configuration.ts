import type { Configuration } from "../../ports/configuration"
import { ConfigError } from "../errors/config-error"
import { foldExtends } from "../inheritance/extends-graph"

/**
 * Checks a configuration as loaded, before inheritance is resolved.
 *
 * @throws {ConfigError} for the first rule that fails
 */
export function validateConfiguration(config: Configuration): void {
  validateRequiredFields(config)
  validateSettings(config)
  validateExtends(config)
  validateCommon(config)
}

export function validateRequiredFields(config: Configuration): void {
  if (config.version.trim() === "") throw ConfigError.missingField("version")
  if (config.environments.size === 0) throw ConfigError.missingField("environments")

  for (const [name, environment] of config.environments) {
    if (environment.description.trim() === "") {
      throw ConfigError.validation(`Environment '${name}' must have a non-empty description`)
    }
  }
}

export function validateSettings(config: Configuration): void {
  const name = config.settings.defaultEnvironment

  if (name !== undefined && !config.environments.has(name)) {
    throw ConfigError.invalidEnvironment(name)
  }
}

/**
 * Every `extends` must name an existing environment, and the graph must be
 * acyclic.
 */
export function validateExtends(config: Configuration): void {
  for (const environment of config.environments.values()) {
    if (environment.extends !== undefined && !config.environments.has(environment.extends)) {
      throw ConfigError.invalidEnvironment(environment.extends)
    }
  }

  foldExtends(config.environments, () => true)
}

export function validateCommon(config: Configuration): void {
  for (const [key, value] of config.common ?? []) {
    if (key.trim() === "") throw ConfigError.validation("Common variable names must not be empty")
    if (value === "") {
      throw ConfigError.validation(`Common variable '${key}' must have a non-empty value`)
    }
  }
}
