import {
  DEFAULT_RESOLUTION_OPTIONS,
  type ResolutionOptions,
} from "../../ports/resolution-options"
import type { ReadonlyVariableMap, VariableMap } from "../../ports/variables"
import { ResolveError } from "../errors/resolve-error"
import { isEncrypted } from "../secrets/encrypted-values"
import { placeholder, substitutePlaceholders } from "./placeholders"

/**
 * Expands a single value against variables committed earlier in the same
 * file. Undefined names become `""`; forward references are not seen.
 */
export function expandInFile(value: string, committed: ReadonlyVariableMap): string {
  return substitutePlaceholders(value, (name) => committed.get(name) ?? "")
}

/**
 * Expands every value of a merged mapping against the whole mapping.
 *
 * References are followed recursively. Each top-level key is expanded with
 * its own traversal stack, seeded with the key; a name met again on that
 * stack is a cycle.
 *
 * @throws {ResolveError} `circular_reference`, or `undefined_variable` when
 *   `undefinedVariables` is `"error"`
 */
export function expandVariables(
  variables: ReadonlyVariableMap,
  options: ResolutionOptions = DEFAULT_RESOLUTION_OPTIONS,
): VariableMap {
  const expanded: VariableMap = new Map()
  const done: VariableMap = new Map()

  for (const [key, value] of variables) {
    expanded.set(key, done.get(key) ?? expandValue(value, variables, options, [key], done))
  }

  return expanded
}

/**
 * `done` holds names whose expansion finished; a finished value does not
 * depend on the stack it was reached from.
 */
function expandValue(
  value: string,
  variables: ReadonlyVariableMap,
  options: ResolutionOptions,
  stack: readonly string[],
  done: VariableMap,
): string {
  if (isEncrypted(value)) return value

  return substitutePlaceholders(value, (name) => {
    const seen = stack.indexOf(name)
    if (seen !== -1) {
      throw ResolveError.circularReference([...stack.slice(seen), name])
    }

    const finished = done.get(name)
    if (finished !== undefined) return finished

    const raw = variables.get(name)
    if (raw === undefined) return replaceUndefined(name, options)

    const result = expandValue(raw, variables, options, [...stack, name], done)
    done.set(name, result)
    return result
  })
}

function replaceUndefined(name: string, options: ResolutionOptions): string {
  switch (options.undefinedVariables) {
    case "error":
      throw ResolveError.undefinedVariable(name)
    case "empty-string":
      return ""
    case "leave-unexpanded":
      return placeholder(name)
  }
}
