import type { Value } from "../../ports/value"
import { RencodeError } from "../errors"
import { I64_MAX, I64_MIN } from "../integers"
import { bool, dict, f64, i64, list, none, str, u64 } from "./value"

export type NativeValue =
  | null
  | boolean
  | number
  | bigint
  | string
  | NativeValue[]
  | { [key: string]: NativeValue }

const MAX_SAFE = BigInt(Number.MAX_SAFE_INTEGER)
const MIN_SAFE = BigInt(Number.MIN_SAFE_INTEGER)

/**
 * Converts plain JavaScript data to a generic value.
 *
 * Safe-integer numbers become `i64`, other numbers `f64`. Bigints above the
 * signed range become `u64`. `Map`s need string keys.
 */
export function fromNative(input: unknown): Value {
  return convert(input, "$")
}

function convert(input: unknown, path: string): Value {
  if (input === null || input === undefined) return none()

  switch (typeof input) {
    case "boolean":
      return bool(input)
    case "number":
      return Number.isSafeInteger(input) ? i64(input) : f64(input)
    case "bigint":
      if (input >= I64_MIN && input <= I64_MAX) return i64(input)
      return u64(input)
    case "string":
      return str(input)
  }

  if (Array.isArray(input)) {
    return list(input.map((item: unknown, i) => convert(item, `${path}[${i}]`)))
  }

  if (input instanceof Map) {
    const entries: [string, Value][] = []
    for (const [key, value] of input) {
      if (typeof key !== "string") {
        throw RencodeError.invalidValue("Map keys must be strings", { path, key: typeof key })
      }
      entries.push([key, convert(value, `${path}.${key}`)])
    }
    return dict(entries)
  }

  if (isPlainObject(input)) {
    return dict(
      Object.entries(input).map(([key, value]): [string, Value] => [key, convert(value, `${path}.${key}`)]),
    )
  }

  throw RencodeError.invalidValue(`Cannot represent ${describe(input)} as a rencode value`, { path })
}

/**
 * Converts a generic value to plain JavaScript data. Integers come back as
 * numbers when they are safe and as bigints otherwise.
 */
export function toNative(value: Value): NativeValue {
  switch (value.type) {
    case "none":
      return null
    case "bool":
    case "f64":
    case "string":
      return value.value
    case "i64":
    case "u64":
      return value.value >= MIN_SAFE && value.value <= MAX_SAFE ? Number(value.value) : value.value
    case "list":
      return value.items.map(toNative)
    case "dict":
      // fromEntries defines own properties, so a "__proto__" key stays data
      return Object.fromEntries([...value.entries].map(([key, item]) => [key, toNative(item)]))
  }
}

function isPlainObject(v: unknown): v is Record<string, unknown> {
  if (typeof v !== "object" || v === null) return false
  const proto: unknown = Object.getPrototypeOf(v)
  return proto === Object.prototype || proto === null
}

function describe(v: unknown): string {
  if (typeof v === "object" && v !== null) return v.constructor?.name ?? "object"
  return typeof v
}
