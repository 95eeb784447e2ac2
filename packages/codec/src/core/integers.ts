import { RencodeError } from "./errors"

export const I8_MIN = -128n
export const I8_MAX = 127n
export const I16_MIN = -32_768n
export const I16_MAX = 32_767n
export const I32_MIN = -2_147_483_648n
export const I32_MAX = 2_147_483_647n
export const I64_MIN = -(2n ** 63n)
export const I64_MAX = 2n ** 63n - 1n
export const U64_MAX = 2n ** 64n - 1n

/**
 * Numbers must be safe integers; anything else would already have lost
 * precision before reaching the codec.
 */
export function toBigInt(value: number | bigint, target: string): bigint {
  if (typeof value === "bigint") return value
  if (!Number.isSafeInteger(value)) throw RencodeError.integerOutOfRange(value, target)
  return BigInt(value)
}

export function checkRange(value: bigint, min: bigint, max: bigint, target: string): bigint {
  if (value < min || value > max) throw RencodeError.integerOutOfRange(value, target)
  return value
}

export type UnsignedOverflow = "error" | "wrap"

/**
 * Maps an unsigned 64-bit value onto the signed wire range. Values above
 * I64_MAX either fail or keep their bit pattern as a negative i64.
 */
export function unsignedToWire(value: bigint, overflow: UnsignedOverflow): bigint {
  checkRange(value, 0n, U64_MAX, "u64")
  if (value <= I64_MAX) return value
  if (overflow === "wrap") return BigInt.asIntN(64, value)
  throw RencodeError.integerOutOfRange(value, "the signed 64-bit wire range")
}
