/**
 * The format's "any" type: a value decoded without a typed target, or built
 * directly by an application.
 *
 * @remarks
 * Integers are bigints so the full 64-bit range survives. `u64` only comes from
 * construction; the wire format does not record signedness, so decoding always
 * yields `i64`.
 */
export type Value =
  | NoneValue
  | BoolValue
  | I64Value
  | U64Value
  | F64Value
  | StringValue
  | ListValue
  | DictValue

export type NoneValue = Readonly<{ type: "none" }>
export type BoolValue = Readonly<{ type: "bool"; value: boolean }>
export type I64Value = Readonly<{ type: "i64"; value: bigint }>
export type U64Value = Readonly<{ type: "u64"; value: bigint }>
export type F64Value = Readonly<{ type: "f64"; value: number }>
export type StringValue = Readonly<{ type: "string"; value: string }>
export type ListValue = Readonly<{ type: "list"; items: readonly Value[] }>

/** Entries are kept in UTF-8 byte order of their keys. */
export type DictValue = Readonly<{ type: "dict"; entries: ReadonlyMap<string, Value> }>

export type ValueType = Value["type"]
