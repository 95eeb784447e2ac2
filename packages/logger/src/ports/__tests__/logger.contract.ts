import type { LogLevelName } from "../log-level"
import type { Logger } from "../logger"

/** One emitted entry, parsed back from the adapter's output. */
export type CapturedLog = {
  level: LogLevelName
  payload: Record<string, unknown>
}

export type LoggerHarness = {
  name: string
  make: (opts?: { level?: LogLevelName }) => {
    logger: Logger
    read: () => CapturedLog[]
  }
}

export function describeLoggerContract(h: LoggerHarness) {
  describe(`Logger contract: ${h.name}`, () => {
    it("child() inherits parent context and adds child context", () => {
      const { logger, read } = h.make({ level: "trace" })

      const child = logger.child({ codec: "user" }).child({ operation: "decode" })

      child.info("decoded")

      const logs = read()

      expect(logs).toHaveLength(1)
      expect(logs[0]?.payload).toMatchObject({ codec: "user", operation: "decode" })
    })

    it("child() overrides on key conflict (shallow)", () => {
      const { logger, read } = h.make({ level: "trace" })

      logger.child({ codec: "user" }).child({ codec: "order" }).info("decoded")

      const logs = read()

      expect(logs).toHaveLength(1)
      expect(logs[0]?.payload.codec).toBe("order")
    })

    it("child() does not mutate the parent", () => {
      const { logger, read } = h.make({ level: "trace" })

      const parent = logger.child({ codec: "user" })
      const child = parent.child({ operation: "encode" })

      parent.info("parent")
      child.info("child")

      const logs = read()

      expect(logs).toHaveLength(2)
      expect(logs[0]?.payload).not.toHaveProperty("operation")
      expect(logs[1]?.payload).toMatchObject({ codec: "user", operation: "encode" })
    })

    it("per-call meta merges with context (meta overrides)", () => {
      const { logger, read } = h.make({ level: "trace" })

      logger.child({ codec: "user" }).info("decoded", { codec: "user-v2", byteLength: 12 })

      const logs = read()

      expect(logs).toHaveLength(1)
      expect(logs[0]?.payload).toMatchObject({ codec: "user-v2", byteLength: 12 })
    })

    it("level filtering: logs below configured minimum are suppressed", () => {
      const { logger, read } = h.make({ level: "warn" })

      logger.info("info")
      logger.warn("warn")
      logger.error("error")

      expect(read().map((l) => l.level)).toEqual(["warn", "error"])
    })
  })
}
