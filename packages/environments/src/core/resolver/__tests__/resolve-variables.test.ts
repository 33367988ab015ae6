import fs from "node:fs/promises"
import os from "node:os"
import path from "node:path"
import { Writable } from "node:stream"
import { type Logger, PinoLogger } from "@strata/logger"
import { mock } from "vitest-mock-extended"
import { catchError } from "../../../tests/utils/catch-error"
import type { VariableSource } from "../../../ports/source"
import { EnvFileError } from "../../errors/env-file-error"
import { ResolveError } from "../../errors/resolve-error"
import { resolveVariables } from "../resolve-variables"
import { defaults, envFile, overrides, processEnv } from "../sources"

describe("resolveVariables", () => {
  let cwd: string

  beforeEach(async () => {
    cwd = await fs.mkdtemp(path.join(os.tmpdir(), "strata-resolve-"))
  })

  afterEach(async () => {
    await fs.rm(cwd, { recursive: true, force: true })
  })

  describe("precedence", () => {
    let all: VariableSource[]

    beforeEach(async () => {
      await fs.writeFile(path.join(cwd, ".env"), "K=f\n")
      all = [
        defaults({ K: "d" }),
        envFile(".env", { cwd }),
        processEnv({ K: "e" }),
        overrides({ K: "o" }),
      ]
    })

    it("takes the value from the last source that defines the key", () => {
      expect(resolveVariables({ sources: all }).get("K")).toBe("o")
    })

    it("falls back to the process environment without overrides", () => {
      expect(resolveVariables({ sources: all.slice(0, 3) }).get("K")).toBe("e")
    })

    it("falls back to the env file without process environment and overrides", () => {
      expect(resolveVariables({ sources: all.slice(0, 2) }).get("K")).toBe("f")
    })

    it("explains which source won", () => {
      const resolved = resolveVariables({ sources: all.slice(0, 2) })

      expect(resolved.explain("K")).toBe("env-file:.env")
      expect(resolved.explain("MISSING")).toBeUndefined()
    })
  })

  it("expands references across sources", async () => {
    await fs.writeFile(path.join(cwd, ".env"), "DATABASE_URL=postgres://${DB_HOST}:${DB_PORT}/app\n")

    const resolved = resolveVariables({
      sources: [
        defaults({ DB_PORT: "5432" }),
        envFile(".env", { cwd }),
        overrides({ DB_HOST: "db.internal" }),
      ],
    })

    expect(resolved.get("DATABASE_URL")).toBe("postgres://db.internal:5432/app")
  })

  it("expands against the merged value, not the overridden one", () => {
    const resolved = resolveVariables({
      sources: [defaults({ HOST: "localhost", URL: "http://${HOST}" }), overrides({ HOST: "example.test" })],
    })

    expect(resolved.get("URL")).toBe("http://example.test")
  })

  it("keeps first-definition order across sources", () => {
    const resolved = resolveVariables({
      sources: [defaults({ A: "1", B: "2" }), overrides({ C: "3", A: "4" })],
    })

    expect(resolved.keys()).toEqual(["A", "B", "C"])
    expect(resolved.toObject()).toEqual({ A: "4", B: "2", C: "3" })
  })

  it("lists the sources that provided final values", () => {
    const resolved = resolveVariables({
      sources: [defaults({ A: "1", B: "2" }), processEnv({}), overrides({ A: "3" })],
    })

    expect(resolved.sourcesUsed()).toEqual(["overrides", "default"])
  })

  it("applies the undefined-variable policy", () => {
    const sources = [defaults({ URL: "http://${HOST}" })]

    expect(resolveVariables({ sources }).get("URL")).toBe("http://")
    expect(resolveVariables({ sources, undefinedVariables: "leave-unexpanded" }).get("URL")).toBe(
      "http://${HOST}",
    )
    expect(
      catchError(ResolveError, () => resolveVariables({ sources, undefinedVariables: "error" })).detail,
    ).toEqual({ kind: "undefined_variable", variable: "HOST" })
  })

  it("detects cycles that span sources", async () => {
    await fs.writeFile(path.join(cwd, ".env"), "A=${B}\n")

    const err = catchError(ResolveError, () =>
      resolveVariables({ sources: [envFile(".env", { cwd }), overrides({ B: "${A}" })] }),
    )

    expect(err.detail).toEqual({ kind: "circular_reference", cycle: ["A", "B", "A"] })
  })

  it("reports the failing source for a missing env file", () => {
    const err = catchError(ResolveError, () => resolveVariables({ sources: [envFile(".env.missing", { cwd })] }))

    expect(err.detail).toEqual({ kind: "source_error", source: "env-file:.env.missing" })
    expect(err.cause).toBeInstanceOf(EnvFileError)
  })

  it("skips an optional env file that does not exist", () => {
    const resolved = resolveVariables({
      sources: [defaults({ A: "1" }), envFile(".env.local", { cwd, required: false })],
    })

    expect(resolved.toObject()).toEqual({ A: "1" })
  })

  it("logs each loaded source", () => {
    const logger = mock<Logger>()

    resolveVariables({ sources: [defaults({ A: "1" }), overrides({ B: "2", C: "3" })], logger })

    expect(logger.debug).toHaveBeenCalledWith("Loaded variable source", {
      module: "resolver",
      source: "default",
      count: 1,
    })
    expect(logger.debug).toHaveBeenCalledWith("Loaded variable source", {
      module: "resolver",
      source: "overrides",
      count: 2,
    })
    expect(logger.debug).toHaveBeenCalledWith("Resolved variables", { module: "resolver", count: 3 })
  })

  it("writes structured records through a pino logger", () => {
    const records: unknown[] = []
    const destination = new Writable({
      write(chunk, _, cb) {
        records.push(JSON.parse(chunk.toString()))
        cb()
      },
    })

    resolveVariables({
      sources: [defaults({ A: "1" })],
      logger: new PinoLogger({ destination }, { level: "debug" }),
    })

    expect(records).toHaveLength(2)
    expect(records[0]).toMatchObject({
      level: 20,
      msg: "Loaded variable source",
      module: "resolver",
      source: "default",
      count: 1,
    })
  })
})
