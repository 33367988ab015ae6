import type { Configuration } from "../../ports/configuration"
import type { VariableOrigin } from "../../ports/variable-origin"
import { requireEnvironment } from "../lookup/environment-variables"
import { inheritanceChain } from "./extends-graph"

/**
 * Where each variable of an environment comes from, in resolved order.
 *
 * Works on the configuration as loaded from the document, before inheritance
 * is resolved.
 *
 * @throws {LookupError} `environment_not_found`
 */
export function explainVariables(config: Configuration, name: string): Map<string, VariableOrigin> {
  const environment = requireEnvironment(config, name)
  const origins = new Map<string, VariableOrigin>()

  for (const key of config.common?.keys() ?? []) {
    origins.set(key, { kind: "common" })
  }

  const [, ...ancestors] = inheritanceChain(config.environments, name)
  for (const ancestor of ancestors.reverse()) {
    for (const key of config.environments.get(ancestor)?.variables.keys() ?? []) {
      origins.set(key, { kind: "inherited", from: ancestor })
    }
  }

  for (const key of environment.variables.keys()) {
    origins.set(key, { kind: "local" })
  }

  return origins
}
