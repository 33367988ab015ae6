import type { ReadonlyVariableMap } from "./variables"

/**
 * The expanded result of merging variable sources.
 *
 * @example
 * ```typescript
 * const resolved = resolveVariables({
 *   sources: [defaults({ PORT: "3000" }), envFile(".env"), processEnv()],
 * })
 *
 * resolved.get("PORT")     // "8080"
 * resolved.explain("PORT") // "env-file:.env"
 * ```
 */
export interface IResolvedVariables {
  /** Expanded variables in first-definition order */
  readonly variables: ReadonlyVariableMap

  get(key: string): string | undefined

  keys(): string[]

  /** Plain object copy, suitable for a child process environment */
  toObject(): Record<string, string>

  /**
   * Explains which source provided the final value for a key.
   *
   * @returns The source name (e.g. "overrides", "env-file:.env"), or
   *   `undefined` for a key no source defined.
   */
  explain(key: string): string | undefined

  /**
   * Names of the sources that provided at least one final value.
   */
  sourcesUsed(): string[]
}
