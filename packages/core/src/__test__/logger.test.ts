import { afterEach, describe, test, expect } from "vitest"
import { pino } from "pino"
import { createLogger, PinoLogger } from "../logger.js"

function capture() {
  const lines: string[] = []
  const root = pino({ level: "debug" }, { write: (line: string) => { lines.push(line) } })
  return { root, lines }
}

describe("PinoLogger", () => {
  test("writes message, name and meta as one JSON line", () => {
    const { root, lines } = capture()
    new PinoLogger("sparse-resolver", root).debug("registry created", { typeId: 3 })

    expect(lines).toHaveLength(1)
    const entry: unknown = JSON.parse(lines[0])
    expect(entry).toMatchObject({ level: 20, name: "sparse-resolver", msg: "registry created", typeId: 3 })
  })

  test("maps each method to its pino level", () => {
    const { root, lines } = capture()
    const log = new PinoLogger("bus", root)
    log.debug("d")
    log.info("i")
    log.warn("w")
    log.error("e")

    const levels = lines.map((l) => {
      const entry: unknown = JSON.parse(l)
      return typeof entry === "object" && entry !== null && "level" in entry ? entry.level : undefined
    })
    expect(levels).toEqual([20, 30, 40, 50])
  })

  test("respects the parent's level", () => {
    const lines: string[] = []
    const root = pino({ level: "warn" }, { write: (line: string) => { lines.push(line) } })
    const log = new PinoLogger("bus", root)
    log.info("dropped")
    log.warn("kept")
    expect(lines).toHaveLength(1)
  })
})

describe("PinoLogger roots", () => {
  afterEach(() => {
    PinoLogger.configure("silent")
  })

  test("configure() sends later loggers to its destination at its level", () => {
    const lines: string[] = []
    PinoLogger.configure("info", { write: (line: string) => { lines.push(line) } })
    const log = createLogger("cli")
    log.info("kept")
    log.debug("dropped")

    expect(lines).toHaveLength(1)
    const entry: unknown = JSON.parse(lines[0])
    expect(entry).toMatchObject({ level: 30, name: "cli", msg: "kept" })
  })

  test("rootAt() shares one root per level, on the configured destination", () => {
    const lines: string[] = []
    PinoLogger.configure("silent", { write: (line: string) => { lines.push(line) } })

    expect(PinoLogger.rootAt("debug")).toBe(PinoLogger.rootAt("debug"))
    createLogger("bus", "debug").debug("resolved")
    createLogger("bus").debug("silenced")

    expect(lines).toHaveLength(1)
    const entry: unknown = JSON.parse(lines[0])
    expect(entry).toMatchObject({ level: 20, name: "bus", msg: "resolved" })
  })
})
