import type { Emitter } from "../../ports/emitter"
import type { Shape } from "../../ports/shape"
import {
  checkRange,
  I8_MAX,
  I8_MIN,
  I16_MAX,
  I16_MIN,
  I32_MAX,
  I32_MIN,
  I64_MAX,
  I64_MIN,
  toBigInt,
  U64_MAX,
} from "../integers"

/**
 * Integer shapes accept every wire width and check the decoded value against
 * their own range.
 */
function integer(name: string, min: bigint, max: bigint, signed: boolean): Shape<number> {
  const emit = (emitter: Emitter, value: number) => (signed ? emitter.int(value) : emitter.uint(value))

  return {
    name,
    visitor: {
      expecting: `an integer (${name})`,
      visitI64: (value) => Number(checkRange(value, min, max, name)),
    },
    write(emitter, value) {
      checkRange(toBigInt(value, name), min, max, name)
      emit(emitter, value)
    },
  }
}

export const i8 = integer("i8", I8_MIN, I8_MAX, true)
export const i16 = integer("i16", I16_MIN, I16_MAX, true)
export const i32 = integer("i32", I32_MIN, I32_MAX, true)
export const u8 = integer("u8", 0n, 255n, false)
export const u16 = integer("u16", 0n, 65_535n, false)
export const u32 = integer("u32", 0n, 4_294_967_295n, false)

export const i64: Shape<bigint> = {
  name: "i64",
  visitor: { expecting: "an integer (i64)", visitI64: (value) => value },
  write: (emitter, value) => emitter.int(checkRange(value, I64_MIN, I64_MAX, "i64")),
}

/**
 * Unsigned 64-bit values. The wire is signed, so decoding a negative integer
 * fails even when it was written with `unsignedOverflow: "wrap"`.
 */
export const u64: Shape<bigint> = {
  name: "u64",
  visitor: { expecting: "an integer (u64)", visitI64: (value) => checkRange(value, 0n, U64_MAX, "u64") },
  write: (emitter, value) => emitter.uint(value),
}

export const f32: Shape<number> = {
  name: "f32",
  visitor: { expecting: "a number (f32)", visitF64: (value) => value, visitI64: (value) => Number(value) },
  write: (emitter, value) => emitter.f32(value),
}

export const f64: Shape<number> = {
  name: "f64",
  visitor: { expecting: "a number (f64)", visitF64: (value) => value, visitI64: (value) => Number(value) },
  write: (emitter, value) => emitter.f64(value),
}
