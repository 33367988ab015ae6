import { readEnvFile } from "../../adapters/env-file/env-file-source"
import { snapshotEnv } from "../../adapters/process-env/process-env-source"
import type {
  DefaultSource,
  EnvFileSource,
  OverridesSource,
  ProcessEnvSource,
  VariableSource,
} from "../../ports/source"
import type { EnvSnapshot, VariableInput, VariableMap } from "../../ports/variables"

export function defaults(values: VariableInput): DefaultSource {
  return { kind: "default", values }
}

export function envFile(file: string, options: Omit<EnvFileSource, "kind" | "file"> = {}): EnvFileSource {
  return { kind: "env-file", file, ...options }
}

export function processEnv(env?: EnvSnapshot): ProcessEnvSource {
  return env === undefined ? { kind: "process-env" } : { kind: "process-env", env }
}

export function overrides(values: VariableInput): OverridesSource {
  return { kind: "overrides", values }
}

/**
 * Provenance name reported by `explain()` and in source errors.
 */
export function sourceName(source: VariableSource): string {
  switch (source.kind) {
    case "default":
      return "default"
    case "env-file":
      return `env-file:${source.file}`
    case "process-env":
      return "process-env"
    case "overrides":
      return "overrides"
  }
}

/**
 * Loads a source as a flat, unexpanded mapping.
 */
export function loadSource(source: VariableSource): VariableMap {
  switch (source.kind) {
    case "default":
    case "overrides":
      return toVariableMap(source.values)
    case "env-file":
      return readEnvFile(source.file, { cwd: source.cwd, required: source.required, expand: false })
    case "process-env":
      return snapshotEnv(source.env)
  }
}

export function toVariableMap(input: VariableInput): VariableMap {
  return isMap(input) ? new Map(input) : new Map(Object.entries(input))
}

function isMap(input: VariableInput): input is ReadonlyMap<string, string> {
  return input instanceof Map
}
