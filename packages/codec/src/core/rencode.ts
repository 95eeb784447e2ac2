import { BufferSink } from "../adapters/memory/buffer-sink"
import { BufferSource } from "../adapters/memory/buffer-source"
import type { ByteSource } from "../ports/byte-source"
import type { Shape } from "../ports/shape"
import type { Value } from "../ports/value"
import { type CodecOptionsInput, resolveCodecOptions } from "./config/codec-options"
import { Decoder } from "./decoder/decoder"
import { Encoder } from "./encoder/encoder"
import { value as valueShape } from "./shapes/value"

export type DecodeInput = Uint8Array | ByteSource

export function encode(value: Value, options?: CodecOptionsInput): Uint8Array {
  return encodeWith(valueShape, value, options)
}

export function encodeWith<T>(shape: Shape<T>, value: T, options?: CodecOptionsInput): Uint8Array {
  const sink = new BufferSink()
  const encoder = new Encoder(sink, options)

  shape.write(encoder, value)
  encoder.finish()

  return sink.toBytes()
}

/**
 * Decodes a single value. The input must end with it unless
 * `allowTrailingBytes` is set.
 */
export function decode(input: DecodeInput, options?: CodecOptionsInput): Value {
  return decodeWith(valueShape, input, options)
}

export function decodeWith<T>(shape: Shape<T>, input: DecodeInput, options?: CodecOptionsInput): T {
  const resolved = resolveCodecOptions(options)
  const decoder = new Decoder(toSource(input), resolved)
  const value = decoder.decode(shape.visitor)

  if (!resolved.allowTrailingBytes) decoder.finish()
  return value
}

/** Every top-level value in the input, in order. */
export function decodeAll(input: DecodeInput, options?: CodecOptionsInput): Value[] {
  return [...new Decoder(toSource(input), options).values()]
}

function toSource(input: DecodeInput): ByteSource {
  return input instanceof Uint8Array ? new BufferSource(input) : input
}
