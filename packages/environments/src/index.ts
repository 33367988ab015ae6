export { readEnvFile } from "./adapters/env-file/env-file-source"
export type { ReadEnvFileOptions } from "./adapters/env-file/env-file-source"
export { snapshotEnv } from "./adapters/process-env/process-env-source"
export {
  ConfigError,
  EnvFileError,
  LookupError,
  ParseError,
  ResolveError,
  SecretError,
} from "./core/errors"
export type {
  ConfigErrorDetail,
  DocumentFailure,
  EnvFileErrorDetail,
  InterpolationFailure,
  LookupErrorDetail,
  ParseErrorDetail,
  ResolveErrorDetail,
  SecretErrorDetail,
} from "./core/errors"
export { expandInFile, expandVariables } from "./core/expansion/expand-variables"
export { substitutePlaceholders } from "./core/expansion/placeholders"
export { explainVariables } from "./core/inheritance/explain-variables"
export { foldExtends, inheritanceChain } from "./core/inheritance/extends-graph"
export { interpolate, interpolateVariables } from "./core/inheritance/interpolate"
export { resolveInheritance } from "./core/inheritance/resolve-inheritance"
export type { ResolveInheritanceOptions } from "./core/inheritance/resolve-inheritance"
export { toConfiguration } from "./core/loading/configuration-document"
export {
  CONFIG_FILE_NAME,
  loadConfiguration,
  parseConfiguration,
} from "./core/loading/load-configuration"
export type { LoadConfigurationOptions } from "./core/loading/load-configuration"
export {
  environmentNames,
  environmentVariables,
  requireEnvironment,
} from "./core/lookup/environment-variables"
export { getVariable } from "./core/lookup/get-variable"
export { parseEnvFile } from "./core/parser/env-file-parser"
export type { ParseEnvFileOptions } from "./core/parser/env-file-parser"
export { resolveVariables } from "./core/resolver/resolve-variables"
export type { ResolveVariablesOptions } from "./core/resolver/resolve-variables"
export { ResolvedVariables } from "./core/resolver/resolved-variables"
export {
  defaults,
  envFile,
  loadSource,
  overrides,
  processEnv,
  sourceName,
} from "./core/resolver/sources"
export { ENCRYPTED_PREFIX, isEncrypted } from "./core/secrets/encrypted-values"
export { decryptValue, decryptVariables, encryptValue } from "./core/secrets/secret-values"
export type { DecryptOptions, EncryptOptions } from "./core/secrets/secret-values"
export { validateConfiguration } from "./core/validation/validate-configuration"
export type { ValueCipher } from "./ports/cipher"
export type {
  Configuration,
  Environment,
  NestedShellBehavior,
  Settings,
} from "./ports/configuration"
export { DEFAULT_RESOLUTION_OPTIONS } from "./ports/resolution-options"
export type { ResolutionOptions, UndefinedVariableBehavior } from "./ports/resolution-options"
export type { IResolvedVariables } from "./ports/resolved-variables"
export type {
  DefaultSource,
  EnvFileSource,
  OverridesSource,
  ProcessEnvSource,
  VariableSource,
  VariableSourceKind,
} from "./ports/source"
export type { VariableOrigin } from "./ports/variable-origin"
export type {
  EnvSnapshot,
  ReadonlyVariableMap,
  VariableInput,
  VariableMap,
} from "./ports/variables"
