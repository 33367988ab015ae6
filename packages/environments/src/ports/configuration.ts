import type { ReadonlyVariableMap } from "./variables"

export type NestedShellBehavior = "prevent" | "allow" | "warn"

export interface Settings {
  /** Environment used when none is named explicitly */
  readonly defaultEnvironment?: string
  readonly nestedShellBehavior?: NestedShellBehavior
  readonly showEnvInPrompt?: boolean
  readonly autoExitOnDirChange?: boolean
}

/**
 * A named bundle of variables plus inheritance and display metadata.
 */
export interface Environment {
  readonly name: string
  readonly description: string

  /** Name of the parent environment whose variables and metadata are inherited */
  readonly extends?: string

  readonly variables: ReadonlyVariableMap

  /** Display color, e.g. for a shell prompt */
  readonly color?: string

  /** Whether switching to this environment asks for confirmation first */
  readonly requiresConfirmation?: boolean
}

/**
 * A configuration document. Built once per load and read-only afterwards.
 */
export interface Configuration {
  readonly version: string

  /** Variables shared by every environment, with the lowest precedence */
  readonly common?: ReadonlyVariableMap

  readonly environments: ReadonlyMap<string, Environment>
  readonly settings: Settings
}
