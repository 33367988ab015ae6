export type LogLevelName = "trace" | "debug" | "info" | "warn" | "error" | "fatal"

/**
 * Numeric log severity levels (higher = more severe).
 *
 * Values match pino's numeric levels.
 */
export const LogLevels = {
  Trace: 10,
  Debug: 20,
  Info: 30,
  Warn: 40,
  Error: 50,
  Fatal: 60,
} as const

export type LogLevel = (typeof LogLevels)[keyof typeof LogLevels]
