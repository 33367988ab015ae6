import { type Logger, NullLogger } from "@strata/logger"
import {
  DEFAULT_RESOLUTION_OPTIONS,
  type ResolutionOptions,
} from "../../ports/resolution-options"
import type { IResolvedVariables } from "../../ports/resolved-variables"
import type { VariableSource } from "../../ports/source"
import type { VariableMap } from "../../ports/variables"
import { ResolveError } from "../errors/resolve-error"
import { expandVariables } from "../expansion/expand-variables"
import { ResolvedVariables } from "./resolved-variables"
import { loadSource, sourceName } from "./sources"

export type ResolveVariablesOptions = Partial<ResolutionOptions> & {
  /** Lowest precedence first */
  sources: readonly VariableSource[]
  logger?: Logger
}

/**
 * Merges sources by precedence, then expands every value against the merged
 * mapping.
 *
 * @example
 * ```typescript
 * const resolved = resolveVariables({
 *   sources: [defaults({ PORT: "3000" }), envFile(".env", { required: false }), processEnv()],
 *   undefinedVariables: "error",
 * })
 * ```
 *
 * @throws {ResolveError} `source_error` when a source cannot be loaded,
 *   `circular_reference` or `undefined_variable` during expansion
 */
export function resolveVariables({
  sources,
  logger = new NullLogger(),
  undefinedVariables = DEFAULT_RESOLUTION_OPTIONS.undefinedVariables,
}: ResolveVariablesOptions): IResolvedVariables {
  const resolution: ResolutionOptions = { undefinedVariables }
  const merged: VariableMap = new Map()
  const provenance = new Map<string, string>()

  for (const source of sources) {
    const name = sourceName(source)
    const values = load(source, name)

    logger.debug("Loaded variable source", { module: "resolver", source: name, count: values.size })

    for (const [key, value] of values) {
      merged.set(key, value)
      provenance.set(key, name)
    }
  }

  const variables = expandVariables(merged, resolution)

  logger.debug("Resolved variables", { module: "resolver", count: variables.size })

  return new ResolvedVariables(variables, provenance)
}

function load(source: VariableSource, name: string): VariableMap {
  try {
    return loadSource(source)
  } catch (err) {
    throw ResolveError.sourceError(name, err)
  }
}
