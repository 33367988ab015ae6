export type ErrorCode = Lowercase<string>

/**
 * Structured metadata attached to errors (line numbers, names, cycles).
 */
export type ErrorContext = Readonly<Record<string, unknown>>

export interface AppError extends Error {
  /** Error code for programmatic handling */
  readonly code: ErrorCode

  /** Structured metadata for debugging */
  readonly context: ErrorContext

  /**
   * Whether this is an expected failure caused by input (true) or a
   * programmer error / invariant violation (false).
   *
   * @remarks
   * - Operational (`true`): malformed env file, missing environment, cycle in `extends`.
   * - Non-operational (`false`): anything thrown that the engine did not anticipate.
   *
   * @default true
   */
  readonly isOperational: boolean

  readonly timestamp: Date

  /**
   * Underlying cause
   *
   * See {@link https://developer.mozilla.org/en-US/docs/Web/JavaScript/Reference/Global_Objects/Error/cause Error.cause}
   */
  readonly cause?: unknown
}

/**
 * Serialized error shape for logs and CLI output.
 *
 * Designed to be JSON.stringify-safe.
 */
export type SerializedError = Readonly<{
  name: string
  code: string
  message: string
  context: Record<string, unknown>
  timestamp: string
  isOperational: boolean
  cause?: SerializedError
  stack?: string
}>
