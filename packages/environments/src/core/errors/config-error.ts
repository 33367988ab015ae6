import { BaseError } from "@strata/errors"

export type InterpolationFailure = "undefined" | "unterminated" | "empty_name"

export type DocumentFailure = "not_found" | "not_a_file" | "permission_denied" | "unreadable" | "syntax"

export type ConfigErrorDetail =
  | { readonly kind: "validation_error"; readonly message: string }
  | { readonly kind: "missing_field"; readonly field: string }
  | { readonly kind: "invalid_environment"; readonly name: string }
  | { readonly kind: "circular_reference"; readonly cycle: readonly string[] }
  | {
      readonly kind: "interpolation_error"
      readonly reason: InterpolationFailure
      /** Placeholder name; empty for `empty_name` and `unterminated` */
      readonly variable: string
      /** Dotted location of the value, e.g. `environments.dev.DATABASE_URL` */
      readonly field: string
      /** 0-based offset of the `${` within the value */
      readonly position: number
    }
  | { readonly kind: "unreadable_document"; readonly path: string; readonly reason: DocumentFailure }

/**
 * Invalid configuration document or environment hierarchy.
 */
export class ConfigError extends BaseError<ConfigErrorDetail["kind"]> {
  readonly detail: ConfigErrorDetail

  constructor(detail: ConfigErrorDetail, cause?: unknown) {
    super(formatMessage(detail), { code: detail.kind, context: { ...detail }, cause })
    this.detail = detail
  }

  static validation(message: string): ConfigError {
    return new ConfigError({ kind: "validation_error", message })
  }

  static missingField(field: string): ConfigError {
    return new ConfigError({ kind: "missing_field", field })
  }

  static invalidEnvironment(name: string): ConfigError {
    return new ConfigError({ kind: "invalid_environment", name })
  }

  static circularReference(cycle: readonly string[]): ConfigError {
    return new ConfigError({ kind: "circular_reference", cycle })
  }
}

function formatMessage(detail: ConfigErrorDetail): string {
  switch (detail.kind) {
    case "validation_error":
      return `Configuration validation failed: ${detail.message}`
    case "missing_field":
      return `Missing required field: ${detail.field}`
    case "invalid_environment":
      return `Invalid environment reference: ${detail.name}`
    case "circular_reference":
      return `Circular reference detected in environment hierarchy: ${detail.cycle.join(" -> ")}`
    case "interpolation_error":
      return formatInterpolation(detail.reason, detail.variable, detail.field, detail.position)
    case "unreadable_document":
      return formatDocument(detail.reason, detail.path)
  }
}

function formatInterpolation(
  reason: InterpolationFailure,
  variable: string,
  field: string,
  position: number,
): string {
  switch (reason) {
    case "undefined":
      return `Environment variable '${variable}' referenced in ${field} is not set`
    case "unterminated":
      return `Unterminated placeholder in ${field} at position ${position}: missing closing '}'`
    case "empty_name":
      return `Empty variable name in ${field} at position ${position}: '\${}' is not valid`
  }
}

function formatDocument(reason: DocumentFailure, path: string): string {
  switch (reason) {
    case "not_found":
      return `Configuration file not found: ${path}`
    case "not_a_file":
      return `Path is not a file: ${path}`
    case "permission_denied":
      return `Permission denied reading configuration file: ${path}`
    case "unreadable":
      return `Failed to read configuration file: ${path}`
    case "syntax":
      return `Invalid TOML in ${path}`
  }
}
