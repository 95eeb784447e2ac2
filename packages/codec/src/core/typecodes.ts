// Typecode byte assignment. Ranges are closed-open: [start, start + count).
//
//   0..43    embedded int      70..101  embedded negative int
//   102..126 fixed dict        128..191 fixed string      192..255 fixed list
//   '0'..'9' decimal-length string (shares bytes with the reserved block)

export const Typecode = {
  Float64: 44,
  Colon: 58,
  List: 59,
  Dict: 60,
  Int8: 62,
  Int16: 63,
  Int32: 64,
  Int64: 65,
  Float32: 66,
  True: 67,
  False: 68,
  None: 69,
  Terminator: 127,
} as const

export type TypecodeRange = Readonly<{ start: number; count: number }>

export const INT_POS_FIXED: TypecodeRange = { start: 0, count: 44 }
export const INT_NEG_FIXED: TypecodeRange = { start: 70, count: 32 }
export const DICT_FIXED: TypecodeRange = { start: 102, count: 25 }
export const STR_FIXED: TypecodeRange = { start: 128, count: 64 }
export const LIST_FIXED: TypecodeRange = { start: 192, count: 64 }

const DIGIT_0 = 0x30
const DIGIT_9 = 0x39

export function inRange(range: TypecodeRange, byte: number): boolean {
  return byte >= range.start && byte < range.start + range.count
}

export function isDigit(byte: number): boolean {
  return byte >= DIGIT_0 && byte <= DIGIT_9
}

export type TypecodeKind =
  | "length-prefixed-string"
  | "fixed-string"
  | "int8"
  | "int16"
  | "int32"
  | "int64"
  | "float32"
  | "float64"
  | "embedded-int"
  | "embedded-negative-int"
  | "true"
  | "false"
  | "none"
  | "list"
  | "fixed-list"
  | "dict"
  | "fixed-dict"
  | "terminator"
  | "reserved"

const SINGLE_BYTE_KINDS: ReadonlyMap<number, TypecodeKind> = new Map<number, TypecodeKind>([
  [Typecode.Float64, "float64"],
  [Typecode.List, "list"],
  [Typecode.Dict, "dict"],
  [Typecode.Int8, "int8"],
  [Typecode.Int16, "int16"],
  [Typecode.Int32, "int32"],
  [Typecode.Int64, "int64"],
  [Typecode.Float32, "float32"],
  [Typecode.True, "true"],
  [Typecode.False, "false"],
  [Typecode.None, "none"],
  [Typecode.Terminator, "terminator"],
])

/**
 * Classify a leading byte. Digits win over the reserved block they sit in.
 */
export function classifyTypecode(byte: number): TypecodeKind {
  if (isDigit(byte)) return "length-prefixed-string"
  if (inRange(STR_FIXED, byte)) return "fixed-string"
  if (inRange(INT_POS_FIXED, byte)) return "embedded-int"
  if (inRange(INT_NEG_FIXED, byte)) return "embedded-negative-int"
  if (inRange(LIST_FIXED, byte)) return "fixed-list"
  if (inRange(DICT_FIXED, byte)) return "fixed-dict"

  return SINGLE_BYTE_KINDS.get(byte) ?? "reserved"
}
