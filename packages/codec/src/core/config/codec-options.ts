import { z } from "zod"
import { type OptionIssue, RencodeError } from "../errors"

export const codecOptionsSchema = z.object({
  /** Maximum nesting of lists and dicts, when encoding and when decoding. */
  maxDepth: z.coerce.number().int().positive().default(128),

  /** Largest declared string length, in bytes, the decoder will read. */
  maxStringLength: z.coerce
    .number()
    .int()
    .nonnegative()
    .default(16 * 1024 * 1024),

  /** Most elements (or pairs) one terminator-closed container may hold when decoding. */
  maxContainerLength: z.coerce.number().int().nonnegative().default(1_048_576),

  /**
   * What to do with unsigned values above 2^63 - 1.
   * "wrap" keeps the 64-bit pattern as a negative i64.
   */
  unsignedOverflow: z.enum(["error", "wrap"]).default("error"),

  /** Let `decode` stop after the first value instead of requiring the input to end. */
  allowTrailingBytes: z.union([z.boolean(), z.stringbool()]).default(false),
})

export type CodecOptions = z.infer<typeof codecOptionsSchema>

export type CodecOptionsInput = Partial<CodecOptions>

export type CodecOptionKey = keyof CodecOptions

export const codecOptionKeys: readonly CodecOptionKey[] = Object.freeze(
  Object.keys(codecOptionsSchema.shape).filter(isOptionKey),
)

const resolved = new WeakMap<object, Readonly<CodecOptions>>()

export const DEFAULT_CODEC_OPTIONS: Readonly<CodecOptions> = parseCodecOptions({})

/**
 * Fills defaults and validates. Option objects this module produced are
 * returned as they are.
 */
export function resolveCodecOptions(input?: CodecOptionsInput): Readonly<CodecOptions> {
  if (input === undefined) return DEFAULT_CODEC_OPTIONS
  return resolved.get(input) ?? parseCodecOptions(input)
}

export function parseCodecOptions(raw: unknown): Readonly<CodecOptions> {
  const result = codecOptionsSchema.safeParse(raw)

  if (!result.success) {
    throw RencodeError.invalidOptions(result.error.issues.map(toOptionIssue))
  }

  const options = Object.freeze(result.data)
  resolved.set(options, options)
  return options
}

function toOptionIssue(issue: { path: PropertyKey[]; message: string }): OptionIssue {
  return {
    path: issue.path.map(String).join("."),
    message: issue.path.length > 0 ? `${issue.path.map(String).join(".")}: ${issue.message}` : issue.message,
  }
}

function isOptionKey(key: string): key is CodecOptionKey {
  return key in codecOptionsSchema.shape
}
