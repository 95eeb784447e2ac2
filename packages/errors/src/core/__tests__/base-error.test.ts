import { BaseError } from "../base-error"

describe("BaseError", () => {
  beforeEach(() => {
    vi.useFakeTimers()
    vi.setSystemTime(new Date("2024-01-15T10:30:00.000Z"))
  })

  afterEach(() => {
    vi.useRealTimers()
  })

  describe("construction", () => {
    it("creates error with required fields", () => {
      const err = new BaseError("input ended mid-value", { code: "unexpected_eof" })

      expect(err.message).toBe("input ended mid-value")
      expect(err.code).toBe("unexpected_eof")
    })

    it("sets name to constructor name", () => {
      const err = new BaseError("test", { code: "test" })

      expect(err.name).toBe("BaseError")
    })

    it("uses the subclass name", () => {
      class DecodeFailure extends BaseError<"decode_failure"> {}

      const err = new DecodeFailure("bad", { code: "decode_failure" })

      expect(err.name).toBe("DecodeFailure")
    })

    it("defaults context to an empty frozen object", () => {
      const err = new BaseError("test", { code: "test" })

      expect(err.context).toEqual({})
      expect(Object.isFrozen(err.context)).toBe(true)
    })

    it("defaults isRetryable to false", () => {
      const err = new BaseError("test", { code: "test" })

      expect(err.isRetryable).toBe(false)
    })

    it("defaults isOperational to true", () => {
      const err = new BaseError("test", { code: "test" })

      expect(err.isOperational).toBe(true)
    })

    it("sets timestamp to current time", () => {
      const err = new BaseError("test", { code: "test" })

      expect(err.timestamp).toEqual(new Date("2024-01-15T10:30:00.000Z"))
    })

    it("copies and freezes the context", () => {
      const context = { offset: 3, byte: 45 }
      const err = new BaseError("test", { code: "test", context })

      context.offset = 99

      expect(err.context).toEqual({ offset: 3, byte: 45 })
      expect(Object.isFrozen(err.context)).toBe(true)
    })

    it("accepts optional cause", () => {
      const cause = new Error("socket closed")
      const err = new BaseError("read failed", { code: "io_error", cause })

      expect(err.cause).toBe(cause)
    })

    it("accepts optional isRetryable and isOperational", () => {
      const err = new BaseError("misuse", {
        code: "invalid_state",
        isRetryable: true,
        isOperational: false,
      })

      expect(err.isRetryable).toBe(true)
      expect(err.isOperational).toBe(false)
    })

    it("has a stack trace", () => {
      const err = new BaseError("test", { code: "test" })

      expect(err.stack).toContain("BaseError")
    })
  })

  describe("type safety", () => {
    it("preserves generic code type", () => {
      type DecodeCode = "unexpected_eof" | "invalid_utf8"
      const err = new BaseError<DecodeCode>("truncated", { code: "unexpected_eof" })

      const code: DecodeCode = err.code
      expect(code).toBe("unexpected_eof")
    })
  })

  describe("inheritance", () => {
    it("is instanceof Error and BaseError", () => {
      const err = new BaseError("test", { code: "test" })

      expect(err instanceof Error).toBe(true)
      expect(err instanceof BaseError).toBe(true)
    })
  })

  describe("toJSON", () => {
    it("returns serialized error", () => {
      const err = new BaseError("unexpected byte", {
        code: "unexpected_byte",
        context: { offset: 4, byte: 61 },
      })

      expect(err.toJSON()).toEqual({
        name: "BaseError",
        code: "unexpected_byte",
        message: "unexpected byte",
        context: { offset: 4, byte: 61 },
        isOperational: true,
        timestamp: "2024-01-15T10:30:00.000Z",
      })
    })
  })
})
