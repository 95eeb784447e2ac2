import { I8_MAX, I8_MIN, I16_MAX, I16_MIN, I32_MAX, I32_MIN } from "../integers"
import { INT_NEG_FIXED, INT_POS_FIXED, STR_FIXED, Typecode } from "../typecodes"

const utf8 = new TextEncoder()

/**
 * Canonical encoding of a signed 64-bit integer: the first form that fits, in
 * the order embedded negative, embedded positive, i8, i16, i32, i64.
 */
export function encodeInt(value: bigint): Uint8Array {
  if (value < 0n && value >= -BigInt(INT_NEG_FIXED.count)) {
    return Uint8Array.of(INT_NEG_FIXED.start - 1 - Number(value))
  }

  if (value >= 0n && value < BigInt(INT_POS_FIXED.count)) {
    return Uint8Array.of(INT_POS_FIXED.start + Number(value))
  }

  if (value >= I8_MIN && value <= I8_MAX) {
    const out = new Uint8Array(2)
    out[0] = Typecode.Int8
    new DataView(out.buffer).setInt8(1, Number(value))
    return out
  }

  if (value >= I16_MIN && value <= I16_MAX) {
    const out = new Uint8Array(3)
    out[0] = Typecode.Int16
    new DataView(out.buffer).setInt16(1, Number(value))
    return out
  }

  if (value >= I32_MIN && value <= I32_MAX) {
    const out = new Uint8Array(5)
    out[0] = Typecode.Int32
    new DataView(out.buffer).setInt32(1, Number(value))
    return out
  }

  const out = new Uint8Array(9)
  out[0] = Typecode.Int64
  new DataView(out.buffer).setBigInt64(1, value)
  return out
}

export function encodeF32(value: number): Uint8Array {
  const out = new Uint8Array(5)
  out[0] = Typecode.Float32
  new DataView(out.buffer).setFloat32(1, value)
  return out
}

export function encodeF64(value: number): Uint8Array {
  const out = new Uint8Array(9)
  out[0] = Typecode.Float64
  new DataView(out.buffer).setFloat64(1, value)
  return out
}

/**
 * Short strings carry their byte length in the typecode; longer ones are
 * written as `<decimal length>:<bytes>`.
 */
export function encodeString(value: string): Uint8Array {
  const bytes = utf8.encode(value)

  if (bytes.length < STR_FIXED.count) {
    const out = new Uint8Array(1 + bytes.length)
    out[0] = STR_FIXED.start + bytes.length
    out.set(bytes, 1)
    return out
  }

  const prefix = utf8.encode(`${bytes.length}:`)
  const out = new Uint8Array(prefix.length + bytes.length)
  out.set(prefix, 0)
  out.set(bytes, prefix.length)
  return out
}
