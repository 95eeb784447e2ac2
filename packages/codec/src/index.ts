export { ChunkSink } from "./adapters/chunk/chunk-sink"
export { ChunkSource } from "./adapters/chunk/chunk-source"
export { EnvSource, type EnvSourceOptions } from "./adapters/env/env-source"
export { BufferSink } from "./adapters/memory/buffer-sink"
export { BufferSource } from "./adapters/memory/buffer-source"
export { ObjectSource } from "./adapters/object/object-source"
export {
  type CodecOptionKey,
  type CodecOptions,
  type CodecOptionsInput,
  codecOptionKeys,
  codecOptionsSchema,
  DEFAULT_CODEC_OPTIONS,
  parseCodecOptions,
  resolveCodecOptions,
} from "./core/config/codec-options"
export { type LoadCodecOptionsArgs, type LoadedCodecOptions, loadCodecOptions } from "./core/config/load-codec-options"
export { Decoder } from "./core/decoder/decoder"
export { stringKeyVisitor, valueVisitor } from "./core/decoder/value-visitor"
export { Encoder } from "./core/encoder/encoder"
export { writeValue } from "./core/encoder/write-value"
export {
  isMalformed,
  isRencodeError,
  isTruncation,
  isTypeMismatch,
  type LimitName,
  type OptionIssue,
  RencodeError,
  type RencodeErrorCode,
} from "./core/errors"
export type { UnsignedOverflow } from "./core/integers"
export { type DecodeInput, decode, decodeAll, decodeWith, encode, encodeWith } from "./core/rencode"
export { createRencodeCodec, RencodeCodec, type RencodeCodecOptions } from "./core/rencode-codec"
export * as shapes from "./core/shapes"
export {
  classifyTypecode,
  DICT_FIXED,
  INT_NEG_FIXED,
  INT_POS_FIXED,
  LIST_FIXED,
  STR_FIXED,
  Typecode,
  type TypecodeKind,
  type TypecodeRange,
} from "./core/typecodes"
export { compareKeys, sortKeys } from "./core/value/key-order"
export { fromNative, type NativeValue, toNative } from "./core/value/native"
export { bool, dict, f64, i64, list, none, sortedEntries, str, u64, valueKind } from "./core/value/value"
export { valueEquals } from "./core/value/value-equals"
export type { ByteSink } from "./ports/byte-sink"
export type { ByteSource } from "./ports/byte-source"
export type { Codec } from "./ports/codec"
export type { ConfigSource } from "./ports/config-source"
export type { Emitter } from "./ports/emitter"
export type { Shape, ShapeType } from "./ports/shape"
export type {
  BoolValue,
  DictValue,
  F64Value,
  I64Value,
  ListValue,
  NoneValue,
  StringValue,
  U64Value,
  Value,
  ValueType,
} from "./ports/value"
export type { DictAccess, ListAccess, Next, Visitor } from "./ports/visitor"
