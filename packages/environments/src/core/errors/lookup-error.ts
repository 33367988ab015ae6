import { BaseError } from "@strata/errors"

export type LookupErrorDetail =
  | { readonly kind: "environment_not_found"; readonly name: string; readonly available: readonly string[] }
  | { readonly kind: "variable_not_found"; readonly environment: string; readonly key: string }

export class LookupError extends BaseError<LookupErrorDetail["kind"]> {
  readonly detail: LookupErrorDetail

  constructor(detail: LookupErrorDetail) {
    super(formatMessage(detail), { code: detail.kind, context: { ...detail } })
    this.detail = detail
  }

  static environmentNotFound(name: string, available: readonly string[]): LookupError {
    return new LookupError({ kind: "environment_not_found", name, available })
  }

  static variableNotFound(environment: string, key: string): LookupError {
    return new LookupError({ kind: "variable_not_found", environment, key })
  }
}

function formatMessage(detail: LookupErrorDetail): string {
  switch (detail.kind) {
    case "environment_not_found":
      return `Environment '${detail.name}' not found. Available: ${detail.available.join(", ")}`
    case "variable_not_found":
      return `Variable '${detail.key}' not found in environment '${detail.environment}'`
  }
}
