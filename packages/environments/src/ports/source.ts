import type { EnvSnapshot, VariableInput } from "./variables"

/**
 * Built-in defaults, lowest precedence when listed first.
 */
export type DefaultSource = {
  readonly kind: "default"
  readonly values: VariableInput
}

/**
 * An env file, parsed without in-file expansion so that references to
 * variables from other sources survive until the merged mapping is expanded.
 */
export type EnvFileSource = {
  readonly kind: "env-file"

  /**
   * Path to the env file, absolute or relative to `cwd`.
   *
   * @example ".env", ".env.production"
   */
  readonly file: string

  /**
   * Base directory for resolving a relative `file`.
   *
   * @default process.cwd()
   */
  readonly cwd?: string

  /**
   * Whether the file must exist.
   *
   * - `true`: a missing file fails the resolution.
   * - `false`: a missing file contributes no variables.
   *
   * @default true
   */
  readonly required?: boolean
}

/**
 * A snapshot of the process environment, taken when the source is loaded.
 */
export type ProcessEnvSource = {
  readonly kind: "process-env"

  /**
   * Environment to snapshot.
   *
   * @default process.env
   */
  readonly env?: EnvSnapshot
}

/**
 * Explicit overrides, e.g. `KEY=value` pairs given on a command line.
 */
export type OverridesSource = {
  readonly kind: "overrides"
  readonly values: VariableInput
}

/**
 * One origin of variable values.
 *
 * Sources are applied in list order; later sources override earlier ones.
 */
export type VariableSource = DefaultSource | EnvFileSource | ProcessEnvSource | OverridesSource

export type VariableSourceKind = VariableSource["kind"]
