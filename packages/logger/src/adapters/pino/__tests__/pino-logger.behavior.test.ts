import { Writable } from "node:stream"
import { describe, expect, it } from "vitest"

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

describe("PinoLogger behavior", () => {
  it("emits JSON to the provided destination", () => {
    const { lines, destination } = makeLineDestination()

    const logger = new PinoLogger({ destination }, { level: "trace" }, { codec: "user" })

    logger.debug("encoded", { operation: "encode", byteLength: 7 })

    expect(lines).toHaveLength(1)

    const payload = JSON.parse(lines[0]!)

    expect(payload).toMatchObject({
      msg: "encoded",
      codec: "user",
      operation: "encode",
      byteLength: 7,
    })
    expect(payload.level).toBe(20)
    expect(typeof payload.time).toBe("number")
  })

  it("serializes err with its cause chain", () => {
    const { lines, destination } = makeLineDestination()

    const logger = new PinoLogger({ destination }, { level: "trace" })
    const err = new Error("decode failed", { cause: new Error("stream reset") })

    logger.warn("Decode failed", { err })

    const payload = JSON.parse(lines[0]!)

    expect(payload.err).toMatchObject({
      type: "Error",
      message: "decode failed",
      cause: { type: "Error", message: "stream reset" },
    })
  })

  it("child() inherits the base logger sink and config", () => {
    const { lines, destination } = makeLineDestination()

    const base = new PinoLogger({ destination }, { level: "warn" }, { codec: "user" })
    const child = base.child({ operation: "decode" })

    child.info("ignored")
    child.warn("logged")

    expect(lines).toHaveLength(1)
    expect(JSON.parse(lines[0]!)).toMatchObject({
      msg: "logged",
      codec: "user",
      operation: "decode",
    })
  })
})
