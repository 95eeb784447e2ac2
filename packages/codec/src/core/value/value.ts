import type {
  BoolValue,
  DictValue,
  F64Value,
  I64Value,
  ListValue,
  NoneValue,
  StringValue,
  U64Value,
  Value,
} from "../../ports/value"
import { checkRange, I64_MAX, I64_MIN, toBigInt, U64_MAX } from "../integers"
import { compareKeys } from "./key-order"

const NONE: NoneValue = Object.freeze({ type: "none" })

export function none(): NoneValue {
  return NONE
}

export function bool(value: boolean): BoolValue {
  return { type: "bool", value }
}

export function i64(value: number | bigint): I64Value {
  return { type: "i64", value: checkRange(toBigInt(value, "i64"), I64_MIN, I64_MAX, "i64") }
}

export function u64(value: number | bigint): U64Value {
  return { type: "u64", value: checkRange(toBigInt(value, "u64"), 0n, U64_MAX, "u64") }
}

export function f64(value: number): F64Value {
  return { type: "f64", value }
}

export function str(value: string): StringValue {
  return { type: "string", value }
}

export function list(items: Iterable<Value>): ListValue {
  return { type: "list", items: [...items] }
}

/**
 * Builds a dict whose entries iterate in key order. A repeated key keeps its
 * last value.
 */
export function dict(entries: Iterable<readonly [string, Value]> | Record<string, Value>): DictValue {
  const source = isIterable(entries) ? entries : Object.entries(entries)
  const merged = new Map<string, Value>()

  for (const [key, value] of source) merged.set(key, value)

  return { type: "dict", entries: sortedMap(merged) }
}

/** Entries of a dict in key order, whatever order its map was built in. */
export function sortedEntries(value: DictValue): [string, Value][] {
  return [...value.entries].sort(([a], [b]) => compareKeys(a, b))
}

/** Label used in type mismatch messages. */
export function valueKind(value: Value): string {
  switch (value.type) {
    case "none":
      return "none"
    case "bool":
      return "a boolean"
    case "i64":
    case "u64":
      return "an integer"
    case "f64":
      return "a float"
    case "string":
      return "a string"
    case "list":
      return "a list"
    case "dict":
      return "a dict"
  }
}

function sortedMap(entries: Map<string, Value>): Map<string, Value> {
  return new Map([...entries].sort(([a], [b]) => compareKeys(a, b)))
}

function isIterable<T>(v: Iterable<T> | object): v is Iterable<T> {
  return Symbol.iterator in v
}
