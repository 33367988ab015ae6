/**
 * Insertion-ordered variable mapping.
 *
 * Setting an existing key replaces its value and keeps its position.
 */
export type VariableMap = Map<string, string>

export type ReadonlyVariableMap = ReadonlyMap<string, string>

/**
 * Variables as callers usually have them at hand: a Map, or a plain object
 * whose key order is the insertion order.
 */
export type VariableInput = ReadonlyVariableMap | Readonly<Record<string, string>>

/**
 * Read-only view of a process environment, shaped like `process.env`.
 */
export type EnvSnapshot = Readonly<Record<string, string | undefined>>
