import { BaseError, type ErrorContext } from "@rencode/errors"

export type RencodeErrorCode =
  | "unexpected_eof"
  | "invalid_length_prefix"
  | "invalid_utf8"
  | "unexpected_byte"
  | "unexpected_terminator"
  | "trailing_bytes"
  | "type_mismatch"
  | "integer_out_of_range"
  | "invalid_value"
  | "missing_field"
  | "unknown_field"
  | "duplicate_field"
  | "length_mismatch"
  | "invalid_state"
  | "limit_exceeded"
  | "invalid_options"
  | "io_error"

export type LimitName = "maxDepth" | "maxStringLength" | "maxContainerLength"

export type OptionIssue = { path: string; message: string }

export class RencodeError extends BaseError<RencodeErrorCode> {
  static unexpectedEof(offset: number, needed: number, received = 0): RencodeError {
    return new RencodeError("Unexpected end of input", {
      code: "unexpected_eof",
      context: { offset, needed, received },
    })
  }

  static invalidLengthPrefix(offset: number, byte: number): RencodeError {
    return new RencodeError(
      `Invalid byte ${byte} in string length prefix, expected a digit or ':'`,
      { code: "invalid_length_prefix", context: { offset, byte } },
    )
  }

  static invalidUtf8(offset: number, cause: unknown): RencodeError {
    return new RencodeError("String bytes are not valid UTF-8", {
      code: "invalid_utf8",
      context: { offset },
      cause,
    })
  }

  static unexpectedByte(offset: number, byte: number): RencodeError {
    return new RencodeError(`Unexpected typecode ${byte}`, {
      code: "unexpected_byte",
      context: { offset, byte },
    })
  }

  static unexpectedTerminator(offset: number): RencodeError {
    return new RencodeError("Unexpected terminator where a value was expected", {
      code: "unexpected_terminator",
      context: { offset, byte: 127 },
    })
  }

  static trailingBytes(offset: number): RencodeError {
    return new RencodeError("Input continues after a complete value", {
      code: "trailing_bytes",
      context: { offset },
    })
  }

  static typeMismatch(expected: string, found: string, offset?: number): RencodeError {
    return new RencodeError(`Expected ${expected}, found ${found}`, {
      code: "type_mismatch",
      context: { expected, found, ...(offset !== undefined && { offset }) },
    })
  }

  static integerOutOfRange(value: number | bigint, target: string): RencodeError {
    return new RencodeError(`Integer ${value} does not fit ${target}`, {
      code: "integer_out_of_range",
      context: { value, target },
    })
  }

  static invalidValue(message: string, context?: ErrorContext): RencodeError {
    return new RencodeError(message, { code: "invalid_value", context })
  }

  static missingField(field: string, record: string): RencodeError {
    return new RencodeError(`Missing field "${field}" in ${record}`, {
      code: "missing_field",
      context: { field, record },
    })
  }

  static unknownField(field: string, record: string): RencodeError {
    return new RencodeError(`Unknown field "${field}" in ${record}`, {
      code: "unknown_field",
      context: { field, record },
    })
  }

  static duplicateField(field: string, record: string): RencodeError {
    return new RencodeError(`Duplicate field "${field}" in ${record}`, {
      code: "duplicate_field",
      context: { field, record },
    })
  }

  static lengthMismatch(container: "list" | "dict", declared: number, actual: number): RencodeError {
    return new RencodeError(
      `${container === "list" ? "List" : "Dict"} declared ${declared} entries but ${actual} were given`,
      { code: "length_mismatch", context: { container, declared, actual } },
    )
  }

  static unconsumed(container: "list" | "dict", offset: number): RencodeError {
    return new RencodeError(`${container === "list" ? "List" : "Dict"} was not read to its end`, {
      code: "length_mismatch",
      context: { container, offset },
    })
  }

  static invalidState(message: string): RencodeError {
    return new RencodeError(message, { code: "invalid_state", isOperational: false })
  }

  static limitExceeded(limit: LimitName, max: number, context?: ErrorContext): RencodeError {
    return new RencodeError(`Exceeded ${limit} (${max})`, {
      code: "limit_exceeded",
      context: { limit, max, ...context },
    })
  }

  static invalidOptions(issues: OptionIssue[]): RencodeError {
    return new RencodeError(issues[0]?.message ?? "Invalid codec options", {
      code: "invalid_options",
      context: { issues },
    })
  }

  /** Wraps a failure thrown by a byte source or sink; codec errors pass through. */
  static io(cause: unknown, offset: number): RencodeError {
    if (cause instanceof RencodeError) return cause

    return new RencodeError("Byte stream failed", {
      code: "io_error",
      context: { offset },
      cause,
      isRetryable: true,
    })
  }
}

const MALFORMED_CODES: ReadonlySet<RencodeErrorCode> = new Set<RencodeErrorCode>([
  "invalid_length_prefix",
  "invalid_utf8",
  "unexpected_byte",
  "unexpected_terminator",
  "trailing_bytes",
  "length_mismatch",
])

export function isRencodeError(err: unknown, code?: RencodeErrorCode): err is RencodeError {
  return err instanceof RencodeError && (code === undefined || err.code === code)
}

/** The input ended before the value did. */
export function isTruncation(err: unknown): err is RencodeError {
  return isRencodeError(err, "unexpected_eof")
}

/** The bytes do not follow the format. */
export function isMalformed(err: unknown): err is RencodeError {
  return isRencodeError(err) && MALFORMED_CODES.has(err.code)
}

/** The bytes are well formed but do not match the requested type. */
export function isTypeMismatch(err: unknown): err is RencodeError {
  return isRencodeError(err, "type_mismatch")
}
