import { BaseError } from "@strata/errors"

export type SecretErrorDetail =
  | { readonly kind: "missing_private_key" }
  | { readonly kind: "missing_cipher" }
  | { readonly kind: "decryption_failed"; readonly key: string }
  | { readonly kind: "encryption_failed" }

export class SecretError extends BaseError<SecretErrorDetail["kind"]> {
  readonly detail: SecretErrorDetail

  constructor(detail: SecretErrorDetail, cause?: unknown) {
    super(formatMessage(detail), { code: detail.kind, context: { ...detail }, cause })
    this.detail = detail
  }
}

function formatMessage(detail: SecretErrorDetail): string {
  switch (detail.kind) {
    case "missing_private_key":
      return "Encrypted values present but no private key is available"
    case "missing_cipher":
      return "Encrypted values present but no cipher is configured"
    case "decryption_failed":
      return `Failed to decrypt value of '${detail.key}'`
    case "encryption_failed":
      return "Failed to encrypt value"
  }
}
