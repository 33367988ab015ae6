import { BaseError } from "@strata/errors"

export type ResolveErrorDetail =
  | { readonly kind: "circular_reference"; readonly cycle: readonly string[] }
  | { readonly kind: "undefined_variable"; readonly variable: string }
  | { readonly kind: "source_error"; readonly source: string }

/**
 * Failure while merging and expanding variable sources.
 */
export class ResolveError extends BaseError<ResolveErrorDetail["kind"]> {
  readonly detail: ResolveErrorDetail

  constructor(detail: ResolveErrorDetail, cause?: unknown) {
    super(formatMessage(detail, cause), { code: detail.kind, context: { ...detail }, cause })
    this.detail = detail
  }

  /**
   * @param cycle - Path of names from the first repeated name back to itself, e.g. `["A", "B", "A"]`
   */
  static circularReference(cycle: readonly string[]): ResolveError {
    return new ResolveError({ kind: "circular_reference", cycle })
  }

  static undefinedVariable(variable: string): ResolveError {
    return new ResolveError({ kind: "undefined_variable", variable })
  }

  static sourceError(source: string, cause: unknown): ResolveError {
    return new ResolveError({ kind: "source_error", source }, cause)
  }
}

function formatMessage(detail: ResolveErrorDetail, cause: unknown): string {
  switch (detail.kind) {
    case "circular_reference":
      return `Circular variable reference: ${detail.cycle.join(" -> ")}`
    case "undefined_variable":
      return `Undefined variable: ${detail.variable}`
    case "source_error": {
      const reason = cause instanceof Error ? `: ${cause.message}` : ""
      return `Failed to load source '${detail.source}'${reason}`
    }
  }
}
