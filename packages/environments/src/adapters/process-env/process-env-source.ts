import type { EnvSnapshot, VariableMap } from "../../ports/variables"

/**
 * Copies the defined entries of a process environment into a new mapping.
 */
export function snapshotEnv(env: EnvSnapshot = process.env): VariableMap {
  const snapshot: VariableMap = new Map()

  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined) snapshot.set(key, value)
  }

  return snapshot
}
