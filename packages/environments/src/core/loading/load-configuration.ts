import { type Logger, NullLogger } from "@strata/logger"
import { parseTomlDocument, readConfigurationFile } from "../../adapters/toml/toml-document"
import type { Configuration } from "../../ports/configuration"
import type { EnvSnapshot } from "../../ports/variables"
import { resolveInheritance } from "../inheritance/resolve-inheritance"
import { validateConfiguration } from "../validation/validate-configuration"
import { toConfiguration } from "./configuration-document"

export const CONFIG_FILE_NAME = ".strata.toml"

/**
 * Parses TOML text into a configuration as written, without validating it or
 * resolving inheritance.
 *
 * @throws {ConfigError} `unreadable_document` (syntax) or `validation_error` (shape)
 */
export function parseConfiguration(content: string, origin = "<inline>"): Configuration {
  return toConfiguration(parseTomlDocument(content, origin), origin)
}

export type LoadConfigurationOptions = {
  /**
   * Path to the configuration file, absolute or relative to `cwd`.
   *
   * @default ".strata.toml"
   */
  file?: string

  /**
   * @default process.cwd()
   */
  cwd?: string

  /**
   * Process environment used for interpolation.
   *
   * @default process.env
   */
  env?: EnvSnapshot

  logger?: Logger
}

/**
 * Reads, validates and resolves a configuration file.
 *
 * @example
 * ```typescript
 * const config = loadConfiguration({ cwd: projectRoot })
 * config.environments.get("dev")?.variables.get("DATABASE_URL")
 * ```
 *
 * @throws {ConfigError} on any failure; no partial configuration is returned
 */
export function loadConfiguration(options: LoadConfigurationOptions = {}): Configuration {
  const logger = options.logger ?? new NullLogger()
  const { path, content } = readConfigurationFile(options.file ?? CONFIG_FILE_NAME, options.cwd)

  const config = parseConfiguration(content, path)
  validateConfiguration(config)

  const resolved = resolveInheritance(config, { env: options.env })

  logger.debug("Loaded configuration", {
    module: "loader",
    file: path,
    count: resolved.environments.size,
  })

  return resolved
}
