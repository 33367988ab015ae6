/**
 * What cross-source expansion does with `${NAME}` when NAME is not defined
 * by any source.
 *
 * - `error`: fail the resolution with an `undefined_variable` error.
 * - `empty-string`: substitute `""`.
 * - `leave-unexpanded`: keep the literal `${NAME}` text.
 */
export type UndefinedVariableBehavior = "error" | "empty-string" | "leave-unexpanded"

export type ResolutionOptions = {
  undefinedVariables: UndefinedVariableBehavior
}

export const DEFAULT_RESOLUTION_OPTIONS: Readonly<ResolutionOptions> = {
  undefinedVariables: "empty-string",
}
