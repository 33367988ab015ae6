import { z } from "zod"
import type { Configuration, Environment, Settings } from "../../ports/configuration"
import { ConfigError } from "../errors/config-error"

const variablesSchema = z.record(z.string(), z.string())

const settingsSchema = z.object({
  default_environment: z.string().optional(),
  nested_shell_behavior: z.enum(["prevent", "allow", "warn"]).optional(),
  show_env_in_prompt: z.boolean().optional(),
  auto_exit_on_dir_change: z.boolean().optional(),
})

const documentSchema = z.object({
  version: z.string().default(""),
  common: variablesSchema.optional(),
  environments: z
    .record(z.string(), z.record(z.string(), z.union([z.string(), z.boolean()])))
    .default({}),
  settings: settingsSchema.default({}),
})

/**
 * Environment tables mix metadata with variables; these keys are metadata.
 */
const metadataSchema = z.object({
  description: z.string().default(""),
  extends: z.string().optional(),
  color: z.string().optional(),
  requires_confirmation: z.boolean().optional(),
})

const METADATA_KEYS: ReadonlySet<string> = new Set(metadataSchema.keyof().options)

type EnvironmentTable = Readonly<Record<string, string | boolean>>

/**
 * Builds a configuration from a parsed document, checking its shape.
 *
 * Semantic rules (non-empty fields, references, cycles) are left to
 * `validateConfiguration`.
 *
 * @param origin - Path or label used in error messages
 * @throws {ConfigError} `validation_error`
 */
export function toConfiguration(document: unknown, origin: string): Configuration {
  const parsed = documentSchema.safeParse(document)

  if (!parsed.success) {
    throw ConfigError.validation(`Invalid document ${origin}:\n${z.prettifyError(parsed.error)}`)
  }

  const { version, common, environments, settings } = parsed.data

  return {
    version,
    ...(common && { common: new Map(Object.entries(common)) }),
    environments: new Map(
      Object.entries(environments).map(([name, table]): [string, Environment] => [
        name,
        toEnvironment(name, table, origin),
      ]),
    ),
    settings: toSettings(settings),
  }
}

function toEnvironment(name: string, table: EnvironmentTable, origin: string): Environment {
  const metadata: Record<string, string | boolean> = {}
  const variables: Record<string, string | boolean> = {}

  for (const [key, value] of Object.entries(table)) {
    if (METADATA_KEYS.has(key)) metadata[key] = value
    else variables[key] = value
  }

  const meta = metadataSchema.safeParse(metadata)
  if (!meta.success) throw invalidEnvironment(name, origin, meta.error)

  const vars = variablesSchema.safeParse(variables)
  if (!vars.success) throw invalidEnvironment(name, origin, vars.error)

  const { description, extends: parent, color, requires_confirmation } = meta.data

  return {
    name,
    description,
    ...(parent !== undefined && { extends: parent }),
    variables: new Map(Object.entries(vars.data)),
    ...(color !== undefined && { color }),
    ...(requires_confirmation !== undefined && { requiresConfirmation: requires_confirmation }),
  }
}

function toSettings(settings: z.infer<typeof settingsSchema>): Settings {
  return {
    ...(settings.default_environment !== undefined && {
      defaultEnvironment: settings.default_environment,
    }),
    ...(settings.nested_shell_behavior !== undefined && {
      nestedShellBehavior: settings.nested_shell_behavior,
    }),
    ...(settings.show_env_in_prompt !== undefined && {
      showEnvInPrompt: settings.show_env_in_prompt,
    }),
    ...(settings.auto_exit_on_dir_change !== undefined && {
      autoExitOnDirChange: settings.auto_exit_on_dir_change,
    }),
  }
}

function invalidEnvironment(name: string, origin: string, error: z.ZodError): ConfigError {
  return ConfigError.validation(
    `Invalid environment '${name}' in ${origin}:\n${z.prettifyError(error)}`,
  )
}
