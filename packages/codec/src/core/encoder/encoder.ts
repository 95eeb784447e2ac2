import type { ByteSink } from "../../ports/byte-sink"
import type { Emitter } from "../../ports/emitter"
import { type CodecOptions, type CodecOptionsInput, resolveCodecOptions } from "../config/codec-options"
import { RencodeError } from "../errors"
import { checkRange, I64_MAX, I64_MIN, toBigInt, unsignedToWire } from "../integers"
import { DICT_FIXED, LIST_FIXED, Typecode } from "../typecodes"
import { encodeF32, encodeF64, encodeInt, encodeString } from "./scalars"

// With the u flag, surrogate pairs match as one code point and never hit this.
const LONE_SURROGATE = /\p{Surrogate}/u

type Frame = {
  kind: "list" | "dict"
  /** Declared element count (pairs for dicts) when written in fixed form. */
  fixed: number | undefined
  /** Values written so far; a dict counts keys and values separately. */
  written: number
}

/**
 * Writes values to a sink as they are emitted.
 *
 * @remarks
 * Bytes reach the sink as soon as each value (or container header) is known,
 * so a failure part-way through leaves the earlier bytes written. Use
 * {@link encode} / {@link encodeWith} to get all-or-nothing output.
 */
export class Encoder implements Emitter {
  private readonly options: Readonly<CodecOptions>
  private readonly frames: Frame[] = []
  private bytesWritten = 0

  constructor(
    private readonly sink: ByteSink,
    options?: CodecOptionsInput,
  ) {
    this.options = resolveCodecOptions(options)
  }

  /** Total bytes handed to the sink. */
  get offset(): number {
    return this.bytesWritten
  }

  /** Open containers. */
  get depth(): number {
    return this.frames.length
  }

  none(): void {
    this.value(Uint8Array.of(Typecode.None))
  }

  bool(value: boolean): void {
    this.value(Uint8Array.of(value ? Typecode.True : Typecode.False))
  }

  int(value: number | bigint): void {
    const v = checkRange(toBigInt(value, "i64"), I64_MIN, I64_MAX, "i64")
    this.value(encodeInt(v))
  }

  uint(value: number | bigint): void {
    const v = unsignedToWire(toBigInt(value, "u64"), this.options.unsignedOverflow)
    this.value(encodeInt(v))
  }

  f32(value: number): void {
    this.value(encodeF32(value))
  }

  f64(value: number): void {
    this.value(encodeF64(value))
  }

  string(value: string): void {
    const surrogate = LONE_SURROGATE.exec(value)
    if (surrogate) {
      throw RencodeError.invalidValue("String contains a lone surrogate", { index: surrogate.index })
    }
    this.value(encodeString(value))
  }

  beginList(length?: number): void {
    this.open("list", length, LIST_FIXED.count, LIST_FIXED.start, Typecode.List)
  }

  endList(): void {
    this.close("list")
  }

  beginDict(length?: number): void {
    this.open("dict", length, DICT_FIXED.count, DICT_FIXED.start, Typecode.Dict)
  }

  endDict(): void {
    this.close("dict")
  }

  /** Fails unless every container has been closed. */
  finish(): void {
    const open = this.frames.at(-1)
    if (open) {
      throw RencodeError.invalidState(`${this.frames.length} container(s) still open, innermost is a ${open.kind}`)
    }
  }

  private value(bytes: Uint8Array): void {
    this.reserveSlot()
    this.write(bytes)
    this.countSlot()
  }

  private open(
    kind: Frame["kind"],
    length: number | undefined,
    fixedCount: number,
    fixedStart: number,
    openCode: number,
  ): void {
    if (length !== undefined && (!Number.isSafeInteger(length) || length < 0)) {
      throw RencodeError.invalidValue(`Invalid ${kind} length ${length}`, { length })
    }
    if (this.frames.length >= this.options.maxDepth) {
      throw RencodeError.limitExceeded("maxDepth", this.options.maxDepth, { offset: this.bytesWritten })
    }

    this.reserveSlot()

    const fixed = length !== undefined && length < fixedCount ? length : undefined
    this.write(Uint8Array.of(fixed === undefined ? openCode : fixedStart + fixed))
    this.frames.push({ kind, fixed, written: 0 })
  }

  private close(kind: Frame["kind"]): void {
    const frame = this.frames.at(-1)

    if (!frame || frame.kind !== kind) {
      throw RencodeError.invalidState(`end${kind === "list" ? "List" : "Dict"}() without a matching begin`)
    }
    if (kind === "dict" && frame.written % 2 !== 0) {
      throw RencodeError.invalidState("Dict closed after a key without its value")
    }

    const entries = kind === "dict" ? frame.written / 2 : frame.written

    if (frame.fixed !== undefined && entries !== frame.fixed) {
      throw RencodeError.lengthMismatch(kind, frame.fixed, entries)
    }
    if (frame.fixed === undefined) {
      this.write(Uint8Array.of(Typecode.Terminator))
    }

    this.frames.pop()
    this.countSlot()
  }

  /** Rejects a value that would overflow the enclosing fixed-count container. */
  private reserveSlot(): void {
    const frame = this.frames.at(-1)
    if (frame?.fixed === undefined) return

    const capacity = frame.kind === "dict" ? frame.fixed * 2 : frame.fixed
    if (frame.written >= capacity) {
      const given = frame.kind === "dict" ? Math.floor(frame.written / 2) + 1 : frame.written + 1
      throw RencodeError.lengthMismatch(frame.kind, frame.fixed, given)
    }
  }

  private countSlot(): void {
    const frame = this.frames.at(-1)
    if (frame) frame.written++
  }

  private write(bytes: Uint8Array): void {
    try {
      this.sink.write(bytes)
    } catch (err) {
      throw RencodeError.io(err, this.bytesWritten)
    }
    this.bytesWritten += bytes.length
  }
}
