import { BaseError } from "@strata/errors"

export type ParseErrorDetail =
  | { readonly kind: "invalid_format"; readonly line: number; readonly content: string }
  | { readonly kind: "unterminated_quote"; readonly line: number }

/**
 * Malformed env file content. Line numbers are 1-based.
 */
export class ParseError extends BaseError<ParseErrorDetail["kind"]> {
  readonly detail: ParseErrorDetail

  constructor(detail: ParseErrorDetail) {
    super(formatMessage(detail), { code: detail.kind, context: { ...detail } })
    this.detail = detail
  }

  static invalidFormat(line: number, content: string): ParseError {
    return new ParseError({ kind: "invalid_format", line, content })
  }

  static unterminatedQuote(line: number): ParseError {
    return new ParseError({ kind: "unterminated_quote", line })
  }
}

function formatMessage(detail: ParseErrorDetail): string {
  switch (detail.kind) {
    case "invalid_format":
      return `Invalid format at line ${detail.line}: '${detail.content}'`
    case "unterminated_quote":
      return `Unterminated quote starting at line ${detail.line}`
  }
}
