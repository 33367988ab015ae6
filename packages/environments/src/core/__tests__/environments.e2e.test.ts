import fs from "node:fs/promises"
import os from "node:os"
import path from "node:path"
import { catchError } from "../../tests/utils/catch-error"
import { FakeCipher } from "../../tests/utils/fake-cipher"
import { LookupError } from "../errors/lookup-error"
import { explainVariables } from "../inheritance/explain-variables"
import { CONFIG_FILE_NAME, loadConfiguration, parseConfiguration } from "../loading/load-configuration"
import { environmentVariables } from "../lookup/environment-variables"
import { getVariable } from "../lookup/get-variable"
import { resolveVariables } from "../resolver/resolve-variables"
import { defaults, envFile, overrides, processEnv } from "../resolver/sources"
import { encryptValue } from "../secrets/secret-values"

const cipher = new FakeCipher()

describe("environments (e2e)", () => {
  let cwd: string
  let document: string

  beforeEach(async () => {
    cwd = await fs.mkdtemp(path.join(os.tmpdir(), "strata-e2e-"))
    document = [
      'version = "1.0"',
      "",
      "[common]",
      'APP_NAME = "shop"',
      "",
      "[environments.base]",
      'description = "Base"',
      'color = "green"',
      'DB_HOST = "localhost"',
      'DATABASE_URL = "postgres://${DB_USER}@localhost/app"',
      "",
      "[environments.dev]",
      'description = "Development"',
      'extends = "base"',
      `API_KEY = "${encryptValue("test-secret", { cipher, publicKey: "public:dev" })}"`,
    ].join("\n")

    await fs.writeFile(path.join(cwd, CONFIG_FILE_NAME), document)
    await fs.writeFile(path.join(cwd, ".env"), "PORT=8080\nBASE_URL=http://${DB_HOST}:${PORT}\n")
  })

  afterEach(async () => {
    await fs.rm(cwd, { recursive: true, force: true })
  })

  it("resolves an environment layered under env file, process and overrides", () => {
    const config = loadConfiguration({ cwd, env: { DB_USER: "app" } })

    const resolved = resolveVariables({
      sources: [
        defaults(environmentVariables(config, "dev")),
        envFile(".env", { cwd }),
        processEnv({ PORT: "9090" }),
        overrides({ DB_HOST: "db.internal" }),
      ],
    })

    expect(resolved.toObject()).toEqual({
      APP_NAME: "shop",
      DB_HOST: "db.internal",
      DATABASE_URL: "postgres://app@localhost/app",
      API_KEY: encryptValue("test-secret", { cipher, publicKey: "public:dev" }),
      PORT: "9090",
      BASE_URL: "http://db.internal:9090",
    })
    expect(resolved.explain("PORT")).toBe("process-env")
    expect(resolved.explain("APP_NAME")).toBe("default")
  })

  it("decrypts a looked-up secret", () => {
    const config = loadConfiguration({ cwd, env: { DB_USER: "app" } })

    expect(getVariable(config, "dev", "API_KEY", { cipher, privateKey: "private:dev" })).toBe(
      "test-secret",
    )
  })

  it("explains where the variables of an environment come from", () => {
    const origins = explainVariables(parseConfiguration(document), "dev")

    expect(Object.fromEntries(origins)).toEqual({
      APP_NAME: { kind: "common" },
      DB_HOST: { kind: "inherited", from: "base" },
      DATABASE_URL: { kind: "inherited", from: "base" },
      API_KEY: { kind: "local" },
    })
  })

  it("names the available environments on a lookup miss", () => {
    const config = loadConfiguration({ cwd, env: { DB_USER: "app" } })

    const err = catchError(LookupError, () => environmentVariables(config, "prod"))

    expect(err.message).toBe("Environment 'prod' not found. Available: base, dev")
  })
})
