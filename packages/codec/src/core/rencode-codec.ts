import { isAppError } from "@rencode/errors"
import { type Logger, NullLogger } from "@rencode/logger"
import type { Codec } from "../ports/codec"
import type { Shape } from "../ports/shape"
import { type CodecOptions, type CodecOptionsInput, resolveCodecOptions } from "./config/codec-options"
import { decodeWith, encodeWith } from "./rencode"

export type RencodeCodecOptions = {
  logger?: Logger
  options?: CodecOptionsInput
  /** Logged as `codec`; defaults to the shape's name. */
  name?: string
}

/**
 * Codec for one shape. Each call is logged at debug; failures are logged at
 * warn and rethrown.
 */
export class RencodeCodec<T> implements Codec<T> {
  readonly name: string
  readonly options: Readonly<CodecOptions>
  private readonly logger: Logger

  constructor(
    private readonly shape: Shape<T>,
    { logger = new NullLogger(), options, name }: RencodeCodecOptions = {},
  ) {
    this.name = name ?? shape.name
    this.options = resolveCodecOptions(options)
    this.logger = logger.child({ codec: this.name, module: "rencode" })
  }

  encode(value: T): Uint8Array {
    const started = performance.now()

    try {
      const bytes = encodeWith(this.shape, value, this.options)
      this.logger.debug("Encoded value", {
        operation: "encode",
        byteLength: bytes.length,
        durationMs: elapsed(started),
      })
      return bytes
    } catch (err) {
      this.logger.warn("Encode failed", { operation: "encode", err, code: codeOf(err) })
      throw err
    }
  }

  decode(bytes: Uint8Array): T {
    const started = performance.now()

    try {
      const value = decodeWith(this.shape, bytes, this.options)
      this.logger.debug("Decoded value", {
        operation: "decode",
        byteLength: bytes.length,
        durationMs: elapsed(started),
      })
      return value
    } catch (err) {
      this.logger.warn("Decode failed", { operation: "decode", byteLength: bytes.length, err, code: codeOf(err) })
      throw err
    }
  }
}

export function createRencodeCodec<T>(shape: Shape<T>, opts?: RencodeCodecOptions): RencodeCodec<T> {
  return new RencodeCodec(shape, opts)
}

function elapsed(started: number): number {
  return Math.round((performance.now() - started) * 1000) / 1000
}

function codeOf(err: unknown): string {
  return isAppError(err) ? err.code : "unknown"
}
