import { Writable } from "node:stream"

import { LogLevels } from "../../../ports/log-level"
import { createPinoLogger, PinoLogger } from "../pino-logger"

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

function parseLine(lines: string[], index: number): Record<string, unknown> {
  const payload: Record<string, unknown> = JSON.parse(lines[index] ?? "null")

  return payload
}

describe("PinoLogger behavior", () => {
  it("emits JSON to the provided destination", () => {
    const { lines, destination } = makeLineDestination()

    const logger = new PinoLogger(
      { destination },
      { level: "trace", prettify: false },
      { module: "folding-map" },
    )

    logger.info("hello", { operation: "set", size: 2 })

    expect(lines).toHaveLength(1)

    const payload = parseLine(lines, 0)

    expect(payload).toMatchObject({
      msg: "hello",
      module: "folding-map",
      operation: "set",
      size: 2,
    })

    expect(typeof payload.time).toBe("number")
    expect(payload.level).toBe(LogLevels.Info)
  })

  it("child() inherits the base logger sink and level", () => {
    const { lines, destination } = makeLineDestination()

    const base = new PinoLogger(
      { destination },
      { level: "warn", prettify: false },
      { module: "folding-map" },
    )
    const child = base.child({ folding: "fold-case/canonical" })

    child.info("ignored")
    child.warn("logged")

    expect(lines).toHaveLength(1)
    expect(parseLine(lines, 0)).toMatchObject({
      msg: "logged",
      module: "folding-map",
      folding: "fold-case/canonical",
    })
  })

  it("serializes err meta with its cause chain", () => {
    const { lines, destination } = makeLineDestination()

    const logger = createPinoLogger({ destination }, { level: "trace" })

    const cause = new Error("root")
    logger.error("failed", { err: new Error("outer", { cause }) })

    expect(parseLine(lines, 0).err).toMatchObject({
      type: "Error",
      message: "outer",
      cause: { type: "Error", message: "root" },
    })
  })

  it("does not write below the configured level", () => {
    const { lines, destination } = makeLineDestination()

    const logger = createPinoLogger({ destination }, { level: "info" })

    logger.trace("t")
    logger.debug("d")

    expect(lines).toHaveLength(0)
  })

  it("writes every level at trace", () => {
    const { lines, destination } = makeLineDestination()

    const logger = createPinoLogger({ destination }, { level: "trace" })

    logger.trace("t")
    logger.debug("d")
    logger.info("i")
    logger.warn("w")
    logger.error("e")
    logger.fatal("f")

    expect(lines.map((_, i) => parseLine(lines, i).level)).toEqual([
      LogLevels.Trace,
      LogLevels.Debug,
      LogLevels.Info,
      LogLevels.Warn,
      LogLevels.Error,
      LogLevels.Fatal,
    ])
  })
})
