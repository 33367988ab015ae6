import path from "node:path"
import type { VariableMap } from "../../ports/variables"
import { EnvFileError, type EnvFileErrorDetail } from "../../core/errors/env-file-error"
import { ParseError } from "../../core/errors/parse-error"
import { parseEnvFile } from "../../core/parser/env-file-parser"
import { type ReadFailure, readTextFile } from "../fs/read-text-file"

/**
 * Options for reading an env file.
 */
export type ReadEnvFileOptions = {
  /**
   * Base directory for resolving a relative path.
   *
   * @default process.cwd()
   */
  cwd?: string

  /**
   * Whether the file must exist. A missing optional file reads as empty.
   *
   * @default true
   */
  required?: boolean

  /**
   * In-file `${NAME}` expansion.
   *
   * @default true
   */
  expand?: boolean
}

/**
 * Reads and parses an env file.
 *
 * @throws {EnvFileError} when the file cannot be read or parsed; a parse
 *   failure carries the {@link ParseError} as `cause`
 */
export function readEnvFile(file: string, options: ReadEnvFileOptions = {}): VariableMap {
  const filePath = path.resolve(options.cwd ?? process.cwd(), file)
  const result = readTextFile(filePath)

  if (!result.ok) {
    if (result.reason === "not_found" && options.required === false) return new Map()

    throw new EnvFileError({ kind: READ_FAILURES[result.reason], path: filePath }, result.cause)
  }

  try {
    return parseEnvFile(result.content, { expand: options.expand ?? true })
  } catch (err) {
    if (err instanceof ParseError) {
      throw new EnvFileError({ kind: "invalid_content", path: filePath }, err)
    }
    throw err
  }
}

const READ_FAILURES: Readonly<Record<ReadFailure, EnvFileErrorDetail["kind"]>> = {
  not_found: "file_not_found",
  not_a_file: "not_a_file",
  permission_denied: "permission_denied",
  unreadable: "unreadable",
}
