import type { ByteSource } from "../../ports/byte-source"
import type { Value } from "../../ports/value"
import type { Visitor } from "../../ports/visitor"
import { type CodecOptions, type CodecOptionsInput, resolveCodecOptions } from "../config/codec-options"
import { RencodeError } from "../errors"
import { classifyTypecode, DICT_FIXED, INT_NEG_FIXED, isDigit, LIST_FIXED, STR_FIXED, Typecode } from "../typecodes"
import { type ElementReader, DictCursor, ListCursor } from "./cursors"
import { valueVisitor } from "./value-visitor"

const utf8 = new TextDecoder("utf-8", { fatal: true, ignoreBOM: true })

// 19 digits already exceed any length a 64-bit platform can address.
const MAX_LENGTH_DIGITS = 19

/**
 * Reads values from a byte source, one leading typecode at a time.
 *
 * @remarks
 * At most one byte is read ahead. A decoder keeps its position across calls,
 * so several top-level values can be read in sequence from one source.
 */
export class Decoder {
  private readonly options: Readonly<CodecOptions>
  private readonly single = new Uint8Array(1)
  private peeked: number | undefined
  private exhausted = false
  private position = 0
  private depth = 0
  private readonly reader: ElementReader

  constructor(
    private readonly source: ByteSource,
    options?: CodecOptionsInput,
  ) {
    this.options = resolveCodecOptions(options)

    this.reader = {
      position: () => this.position,
      maxContainerLength: this.options.maxContainerLength,
      readElement: (visitor) => this.readValue(visitor),
      takeTerminator: () => this.takeTerminator(),
    }
  }

  /** Bytes consumed so far. */
  get offset(): number {
    return this.position
  }

  /** Reads one value into `visitor`. Input after the value is left unread. */
  decode<T>(visitor: Visitor<T>): T {
    return this.readValue(visitor)
  }

  decodeValue(): Value {
    return this.readValue(valueVisitor)
  }

  atEnd(): boolean {
    return this.peek() === undefined
  }

  /** Fails with `trailing_bytes` unless the input is exhausted. */
  finish(): void {
    if (!this.atEnd()) throw RencodeError.trailingBytes(this.position)
  }

  /** Generic values until the input ends. */
  *values(): Generator<Value, void, undefined> {
    while (!this.atEnd()) yield this.decodeValue()
  }

  private readValue<T>(visitor: Visitor<T>): T {
    const start = this.position
    const byte = this.next()
    const kind = classifyTypecode(byte)

    switch (kind) {
      case "length-prefixed-string":
        return this.visitString(visitor, this.readLengthPrefix(byte), start)
      case "fixed-string":
        return this.visitString(visitor, byte - STR_FIXED.start, start)
      case "embedded-int":
        return this.visitI8(visitor, byte, start)
      case "embedded-negative-int":
        return this.visitI8(visitor, INT_NEG_FIXED.start - 1 - byte, start)
      case "int8":
        return this.visitI8(visitor, this.view(1).getInt8(0), start)
      case "int16": {
        const v = this.view(2).getInt16(0)
        if (visitor.visitI16) return visitor.visitI16(v)
        return this.visitI64(visitor, BigInt(v), start)
      }
      case "int32": {
        const v = this.view(4).getInt32(0)
        if (visitor.visitI32) return visitor.visitI32(v)
        return this.visitI64(visitor, BigInt(v), start)
      }
      case "int64":
        return this.visitI64(visitor, this.view(8).getBigInt64(0), start)
      case "float32": {
        const v = this.view(4).getFloat32(0)
        if (visitor.visitF32) return visitor.visitF32(v)
        return this.visitF64(visitor, v, start)
      }
      case "float64":
        return this.visitF64(visitor, this.view(8).getFloat64(0), start)
      case "true":
      case "false":
        if (visitor.visitBool) return visitor.visitBool(kind === "true")
        throw this.mismatch(visitor, "a boolean", start)
      case "none":
        if (visitor.visitNone) return visitor.visitNone()
        throw this.mismatch(visitor, "none", start)
      case "list":
        return this.visitList(visitor, undefined, start)
      case "fixed-list":
        return this.visitList(visitor, byte - LIST_FIXED.start, start)
      case "dict":
        return this.visitDict(visitor, undefined, start)
      case "fixed-dict":
        return this.visitDict(visitor, byte - DICT_FIXED.start, start)
      case "terminator":
        throw RencodeError.unexpectedTerminator(start)
      case "reserved":
        throw RencodeError.unexpectedByte(start, byte)
    }
  }

  private visitI8<T>(visitor: Visitor<T>, value: number, start: number): T {
    if (visitor.visitI8) return visitor.visitI8(value)
    return this.visitI64(visitor, BigInt(value), start)
  }

  private visitI64<T>(visitor: Visitor<T>, value: bigint, start: number): T {
    if (visitor.visitI64) return visitor.visitI64(value)
    throw this.mismatch(visitor, "an integer", start)
  }

  private visitF64<T>(visitor: Visitor<T>, value: number, start: number): T {
    if (visitor.visitF64) return visitor.visitF64(value)
    throw this.mismatch(visitor, "a float", start)
  }

  private visitString<T>(visitor: Visitor<T>, length: number, start: number): T {
    if (length > this.options.maxStringLength) {
      throw RencodeError.limitExceeded("maxStringLength", this.options.maxStringLength, {
        offset: start,
        declared: length,
      })
    }

    const payload = this.position
    const bytes = this.readExact(length)

    let text: string
    try {
      text = utf8.decode(bytes)
    } catch (err) {
      throw RencodeError.invalidUtf8(payload, err)
    }

    if (visitor.visitString) return visitor.visitString(text)
    throw this.mismatch(visitor, "a string", start)
  }

  private visitList<T>(visitor: Visitor<T>, length: number | undefined, start: number): T {
    if (!visitor.visitList) throw this.mismatch(visitor, "a list", start)

    this.enter(start)
    try {
      const cursor = new ListCursor(this.reader, length)
      const result = visitor.visitList(cursor)
      cursor.end()
      return result
    } finally {
      this.depth--
    }
  }

  private visitDict<T>(visitor: Visitor<T>, length: number | undefined, start: number): T {
    if (!visitor.visitDict) throw this.mismatch(visitor, "a dict", start)

    this.enter(start)
    try {
      const cursor = new DictCursor(this.reader, length)
      const result = visitor.visitDict(cursor)
      cursor.end()
      return result
    } finally {
      this.depth--
    }
  }

  private enter(offset: number): void {
    if (this.depth >= this.options.maxDepth) {
      throw RencodeError.limitExceeded("maxDepth", this.options.maxDepth, { offset })
    }
    this.depth++
  }

  private mismatch(visitor: Visitor<unknown>, found: string, offset: number): RencodeError {
    return RencodeError.typeMismatch(visitor.expecting, found, offset)
  }

  /** Reads the rest of `<digits>:` after its first digit. */
  private readLengthPrefix(first: number): number {
    let digits = String.fromCharCode(first)

    for (;;) {
      const offset = this.position
      const byte = this.next()
      if (byte === Typecode.Colon) break

      if (!isDigit(byte) || digits.length >= MAX_LENGTH_DIGITS) {
        throw RencodeError.invalidLengthPrefix(offset, byte)
      }
      digits += String.fromCharCode(byte)
    }

    return Number(digits)
  }

  private takeTerminator(): boolean {
    const byte = this.peek()
    if (byte === undefined) throw RencodeError.unexpectedEof(this.position, 1)
    if (byte !== Typecode.Terminator) return false

    this.next()
    return true
  }

  private view(length: number): DataView {
    const bytes = this.readExact(length)
    return new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength)
  }

  private peek(): number | undefined {
    if (this.peeked === undefined && !this.exhausted) {
      const n = this.pull(this.single)
      const byte = this.single[0]
      if (n === 0 || byte === undefined) this.exhausted = true
      else this.peeked = byte
    }
    return this.peeked
  }

  private next(): number {
    const byte = this.peek()
    if (byte === undefined) throw RencodeError.unexpectedEof(this.position, 1)

    this.peeked = undefined
    this.position++
    return byte
  }

  private readExact(length: number): Uint8Array {
    const out = new Uint8Array(length)
    const start = this.position
    let filled = 0

    if (length > 0 && this.peeked !== undefined) {
      out[0] = this.peeked
      this.peeked = undefined
      filled = 1
    }

    while (filled < length && !this.exhausted) {
      const n = this.pull(out.subarray(filled))
      if (n === 0) this.exhausted = true
      filled += n
    }

    this.position += filled
    if (filled < length) throw RencodeError.unexpectedEof(start, length, filled)
    return out
  }

  private pull(target: Uint8Array): number {
    let n: number
    try {
      n = this.source.read(target)
    } catch (err) {
      throw RencodeError.io(err, this.position)
    }

    if (!Number.isInteger(n) || n < 0 || n > target.length) {
      throw RencodeError.io(new RangeError(`Byte source returned ${n} for a ${target.length}-byte read`), this.position)
    }
    return n
  }
}
