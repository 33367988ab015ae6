import { Writable } from "node:stream"
import { PinoLogger } from "../pino-logger"

function makeLineDestination() {
  const lines: string[] = []

  const destination = new Writable({
    write(chunk, _encoding, callback) {
      const line = chunk.toString("utf8").trim()
      if (line) lines.push(line)
      callback()
    },
  })

  return { lines, destination }
}

function parseLine(line: string | undefined): Record<string, unknown> {
  return JSON.parse(line ?? "{}")
}

describe("PinoLogger behavior", () => {
  it("emits JSON to the provided destination", () => {
    const { lines, destination } = makeLineDestination()

    const logger = new PinoLogger({ destination }, { level: "trace" }, { module: "loader" })

    logger.info("loaded configuration", { file: ".strata.toml", count: 3 })

    expect(lines).toHaveLength(1)

    const payload = parseLine(lines[0])

    expect(payload).toMatchObject({
      msg: "loaded configuration",
      module: "loader",
      file: ".strata.toml",
      count: 3,
    })
    expect(typeof payload.time).toBe("number")
    expect(payload.level).toBe(30)
  })

  it("child() inherits the base logger sink and level", () => {
    const { lines, destination } = makeLineDestination()

    const base = new PinoLogger({ destination }, { level: "warn" }, { module: "resolver" })
    const child = base.child({ environment: "prod" })

    child.info("ignored")
    child.warn("logged")

    expect(lines).toHaveLength(1)
    expect(parseLine(lines[0])).toMatchObject({
      msg: "logged",
      module: "resolver",
      environment: "prod",
    })
  })

  it("serializes err with its cause chain", () => {
    const { lines, destination } = makeLineDestination()

    const logger = new PinoLogger({ destination }, { level: "trace" })
    const err = new Error("outer", { cause: new Error("inner") })

    logger.error("load failed", { err })

    const payload = parseLine(lines[0])

    expect(payload.err).toMatchObject({
      type: "Error",
      message: "outer",
      cause: { type: "Error", message: "inner" },
    })
  })
})
