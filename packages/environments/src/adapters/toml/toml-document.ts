import path from "node:path"
import { load as parseToml } from "js-toml"
import { ConfigError } from "../../core/errors/config-error"
import { readTextFile } from "../fs/read-text-file"

/**
 * Parses TOML text into a plain document.
 *
 * @param origin - Path or label used in error messages
 * @throws {ConfigError} `unreadable_document` with reason `syntax`
 */
export function parseTomlDocument(content: string, origin: string): unknown {
  try {
    return parseToml(content)
  } catch (err) {
    throw new ConfigError({ kind: "unreadable_document", path: origin, reason: "syntax" }, err)
  }
}

/**
 * Reads a configuration file as text.
 *
 * @returns The absolute path and the file content
 * @throws {ConfigError} `unreadable_document`
 */
export function readConfigurationFile(
  file: string,
  cwd: string = process.cwd(),
): { path: string; content: string } {
  const filePath = path.resolve(cwd, file)
  const result = readTextFile(filePath)

  if (!result.ok) {
    throw new ConfigError(
      { kind: "unreadable_document", path: filePath, reason: result.reason },
      result.cause,
    )
  }

  return { path: filePath, content: result.content }
}
