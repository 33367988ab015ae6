import { catchError } from "../../../tests/utils/catch-error"
import { configuration, environment } from "../../../tests/utils/configuration-builders"
import { ConfigError } from "../../errors/config-error"
import { resolveInheritance } from "../resolve-inheritance"

const env = { USER: "dev" }

describe("resolveInheritance", () => {
  it("inherits color and variables from the parent and common", () => {
    const config = configuration(
      [
        environment("base", { color: "blue", variables: { LOG_LEVEL: "info" } }),
        environment("dev", { extends: "base", variables: { DEBUG: "true" } }),
      ],
      { common: { APP: "x" } },
    )

    const dev = resolveInheritance(config, { env }).environments.get("dev")

    expect(dev?.color).toBe("blue")
    expect(dev?.variables.get("APP")).toBe("x")
    expect(dev?.variables.get("LOG_LEVEL")).toBe("info")
    expect(dev?.variables.get("DEBUG")).toBe("true")
  })

  it("merges common, each ancestor and the environment in that order", () => {
    const config = configuration(
      [
        environment("prod", {
          extends: "staging",
          variables: { C: "prod", D: "prod" },
        }),
        environment("staging", { extends: "base", variables: { B: "staging", C: "staging" } }),
        environment("base", { variables: { A: "base", B: "base" } }),
      ],
      { common: { A: "common", Z: "common" } },
    )

    const prod = resolveInheritance(config, { env }).environments.get("prod")

    expect(Object.fromEntries(prod?.variables ?? [])).toEqual({
      A: "base",
      Z: "common",
      B: "staging",
      C: "prod",
      D: "prod",
    })
  })

  it("lets an environment override common", () => {
    const config = configuration([environment("dev", { variables: { APP: "mine" } })], {
      common: { APP: "shared" },
    })

    expect(resolveInheritance(config, { env }).environments.get("dev")?.variables.get("APP")).toBe(
      "mine",
    )
  })

  it("keeps the child's own metadata", () => {
    const config = configuration([
      environment("base", { description: "Base", color: "blue", requiresConfirmation: true }),
      environment("prod", {
        description: "Production",
        extends: "base",
        color: "red",
        requiresConfirmation: false,
      }),
    ])

    const prod = resolveInheritance(config, { env }).environments.get("prod")

    expect(prod?.description).toBe("Production")
    expect(prod?.color).toBe("red")
    expect(prod?.requiresConfirmation).toBe(false)
  })

  it("inherits requiresConfirmation through several levels", () => {
    const config = configuration([
      environment("root", { requiresConfirmation: true }),
      environment("mid", { extends: "root" }),
      environment("leaf", { extends: "mid" }),
    ])

    expect(resolveInheritance(config, { env }).environments.get("leaf")?.requiresConfirmation).toBe(
      true,
    )
  })

  it("leaves metadata unset when no ancestor sets it", () => {
    const config = configuration([environment("dev")])

    const dev = resolveInheritance(config, { env }).environments.get("dev")

    expect(dev).not.toHaveProperty("color")
    expect(dev).not.toHaveProperty("requiresConfirmation")
  })

  it("interpolates variables, descriptions and common from the process environment", () => {
    const config = configuration(
      [environment("dev", { description: "Dev for ${USER}", variables: { HOME_DIR: "/home/${USER}" } })],
      { common: { OWNER: "${USER}" } },
    )

    const resolved = resolveInheritance(config, { env })
    const dev = resolved.environments.get("dev")

    expect(dev?.description).toBe("Dev for dev")
    expect(dev?.variables.get("HOME_DIR")).toBe("/home/dev")
    expect(dev?.variables.get("OWNER")).toBe("dev")
    expect(resolved.common?.get("OWNER")).toBe("dev")
  })

  it("does not expand references between document variables", () => {
    const config = configuration([
      environment("dev", { variables: { HOST: "db", URL: "postgres://${HOST}" } }),
    ])

    const err = catchError(ConfigError, () => resolveInheritance(config, { env }))

    expect(err.detail).toMatchObject({ reason: "undefined", variable: "HOST", field: "environments.dev.URL" })
  })

  it("does not take inherited object members for process variables", () => {
    const config = configuration([environment("dev", { variables: { A: "${hasOwnProperty}" } })])

    const err = catchError(ConfigError, () => resolveInheritance(config, { env }))

    expect(err.detail).toMatchObject({ reason: "undefined", variable: "hasOwnProperty", field: "environments.dev.A" })
  })

  it("reads process.env by default", () => {
    vi.stubEnv("STRATA_INHERITANCE_TEST", "from-process")
    const config = configuration([environment("dev", { variables: { V: "${STRATA_INHERITANCE_TEST}" } })])

    expect(resolveInheritance(config).environments.get("dev")?.variables.get("V")).toBe("from-process")
  })

  it("fails on an extends cycle", () => {
    const config = configuration([
      environment("A", { extends: "B" }),
      environment("B", { extends: "A" }),
    ])

    const err = catchError(ConfigError, () => resolveInheritance(config, { env }))

    expect(err.detail).toEqual({ kind: "circular_reference", cycle: ["A", "B", "A"] })
  })

  it("does not modify the input configuration", () => {
    const base = environment("base", { color: "blue", variables: { A: "1" } })
    const dev = environment("dev", { extends: "base", variables: { B: "2" } })
    const config = configuration([base, dev], { common: { C: "3" } })

    resolveInheritance(config, { env })

    expect(config.environments.get("dev")).toBe(dev)
    expect([...dev.variables.keys()]).toEqual(["B"])
    expect(dev).not.toHaveProperty("color")
  })
})
