export type { ConfigErrorDetail, DocumentFailure, InterpolationFailure } from "./config-error"
export { ConfigError } from "./config-error"
export type { EnvFileErrorDetail } from "./env-file-error"
export { EnvFileError } from "./env-file-error"
export type { LookupErrorDetail } from "./lookup-error"
export { LookupError } from "./lookup-error"
export type { ParseErrorDetail } from "./parse-error"
export { ParseError } from "./parse-error"
export type { ResolveErrorDetail } from "./resolve-error"
export { ResolveError } from "./resolve-error"
export type { SecretErrorDetail } from "./secret-error"
export { SecretError } from "./secret-error"
