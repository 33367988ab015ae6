import type { Environment } from "../../ports/configuration"
import { ConfigError } from "../errors/config-error"

/**
 * Folds every environment together with its resolved parent, parents first.
 *
 * Walks the `extends` edges depth first over the name-indexed table with an
 * explicit path, memoizing each environment once it is folded.
 *
 * @param names - Environments to fold, in result order; all by default
 * @throws {ConfigError} `circular_reference` with the path suffix plus the
 *   repeated name, or `invalid_environment` for a dangling `extends`
 */
export function foldExtends<T>(
  environments: ReadonlyMap<string, Environment>,
  fold: (environment: Environment, parent: T | undefined) => T,
  names: Iterable<string> = environments.keys(),
): Map<string, T> {
  const memo = new Map<string, { value: T }>()

  const visit = (name: string, path: readonly string[]): T => {
    const hit = memo.get(name)
    if (hit) return hit.value

    const seen = path.indexOf(name)
    if (seen !== -1) throw ConfigError.circularReference([...path.slice(seen), name])

    const environment = environments.get(name)
    if (!environment) throw ConfigError.invalidEnvironment(name)

    const parent =
      environment.extends === undefined ? undefined : visit(environment.extends, [...path, name])
    const value = fold(environment, parent)

    memo.set(name, { value })
    return value
  }

  const folded = new Map<string, T>()
  for (const name of names) folded.set(name, visit(name, []))

  return folded
}

/**
 * The environment followed by its ancestors: `[name, parent, …, root]`.
 */
export function inheritanceChain(
  environments: ReadonlyMap<string, Environment>,
  name: string,
): string[] {
  const chains = foldExtends<readonly string[]>(
    environments,
    (environment, parent) => [environment.name, ...(parent ?? [])],
    [name],
  )

  return [...(chains.get(name) ?? [])]
}
