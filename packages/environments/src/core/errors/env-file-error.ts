import { BaseError } from "@strata/errors"

export type EnvFileErrorDetail =
  | { readonly kind: "file_not_found"; readonly path: string }
  | { readonly kind: "not_a_file"; readonly path: string }
  | { readonly kind: "permission_denied"; readonly path: string }
  | { readonly kind: "unreadable"; readonly path: string }
  | { readonly kind: "invalid_content"; readonly path: string }

export class EnvFileError extends BaseError<EnvFileErrorDetail["kind"]> {
  readonly detail: EnvFileErrorDetail

  constructor(detail: EnvFileErrorDetail, cause?: unknown) {
    super(formatMessage(detail, cause), { code: detail.kind, context: { ...detail }, cause })
    this.detail = detail
  }
}

function formatMessage(detail: EnvFileErrorDetail, cause: unknown): string {
  switch (detail.kind) {
    case "file_not_found":
      return `Env file not found: ${detail.path}`
    case "not_a_file":
      return `Path is not a file: ${detail.path}`
    case "permission_denied":
      return `Permission denied reading env file: ${detail.path}`
    case "unreadable":
      return `Failed to read env file: ${detail.path}`
    case "invalid_content": {
      const reason = cause instanceof Error ? `: ${cause.message}` : ""
      return `Parse error in env file ${detail.path}${reason}`
    }
  }
}
