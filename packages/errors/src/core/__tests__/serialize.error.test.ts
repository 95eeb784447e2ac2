import { BaseError, serializeError } from "../base-error"

describe("serializeError", () => {
  beforeEach(() => {
    vi.useFakeTimers()
    vi.setSystemTime(new Date("2024-01-15T10:30:00.000Z"))
  })

  afterEach(() => {
    vi.useRealTimers()
  })

  describe("BaseError instances", () => {
    it("serializes all fields", () => {
      const err = new BaseError("limit exceeded", {
        code: "limit_exceeded",
        context: { limit: "maxDepth", max: 4 },
        isRetryable: true,
        isOperational: false,
      })

      expect(serializeError(err)).toEqual({
        name: "BaseError",
        code: "limit_exceeded",
        message: "limit exceeded",
        context: { limit: "maxDepth", max: 4 },
        isOperational: false,
        timestamp: "2024-01-15T10:30:00.000Z",
      })
    })

    it("renders bigint context values as strings", () => {
      const err = new BaseError("out of range", {
        code: "integer_out_of_range",
        context: { value: 18446744073709551615n },
      })

      const serialized = serializeError(err)

      expect(serialized.context).toEqual({ value: "18446744073709551615" })
      expect(() => JSON.stringify(serialized)).not.toThrow()
    })

    it("excludes stack by default", () => {
      const err = new BaseError("test", { code: "test" })

      expect("stack" in serializeError(err)).toBe(false)
    })

    it("includes stack when requested", () => {
      const err = new BaseError("test", { code: "test" })

      const serialized = serializeError(err, { includeStack: true })

      expect(serialized.stack).toContain("BaseError")
    })

    it("omits stack property when stack is empty", () => {
      const err = new BaseError("test", { code: "test" })
      err.stack = ""

      const serialized = serializeError(err, { includeStack: true })

      expect("stack" in serialized).toBe(false)
    })

    it("serializes cause chain recursively", () => {
      const root = new Error("stream reset")
      const middle = new BaseError("read failed", { code: "io_error", cause: root })
      const outer = new BaseError("decode failed", { code: "decode_failed", cause: middle })

      const serialized = serializeError(outer)

      expect(serialized.cause?.code).toBe("io_error")
      expect(serialized.cause?.cause?.code).toBe("unknown")
      expect(serialized.cause?.cause?.message).toBe("stream reset")
    })

    it("omits cause property when undefined", () => {
      const err = new BaseError("no cause", { code: "test" })

      expect("cause" in serializeError(err)).toBe(false)
    })
  })

  describe("standard Error instances", () => {
    it("serializes with code unknown and isOperational false", () => {
      const serialized = serializeError(new Error("standard error"))

      expect(serialized.code).toBe("unknown")
      expect(serialized.isOperational).toBe(false)
    })

    it("preserves error subclass name", () => {
      const serialized = serializeError(new RangeError("offset is out of bounds"))

      expect(serialized.name).toBe("RangeError")
    })

    it("handles Error with cause", () => {
      const err = new Error("wrapper", { cause: new Error("root") })

      expect(serializeError(err).cause?.message).toBe("root")
    })
  })

  describe("non-Error values", () => {
    it("wraps string as message", () => {
      const serialized = serializeError("something went wrong")

      expect(serialized.message).toBe("something went wrong")
      expect(serialized.name).toBe("NonErrorThrown")
    })

    it("wraps object in context.value", () => {
      const obj = { typecode: 45 }

      const serialized = serializeError(obj)

      expect(serialized.context).toEqual({ value: obj })
      expect(serialized.message).toBe("Unknown error")
    })

    it("wraps bigint as a string", () => {
      expect(serializeError(7n).context).toEqual({ value: "7" })
    })

    it("handles null and undefined", () => {
      expect(serializeError(null).context).toEqual({ value: null })
      expect(serializeError(undefined).context).toEqual({ value: undefined })
    })
  })
})
