/**
 * Codec defines a bidirectional transformation between a typed value `T`
 * and its rencode bytes.
 *
 * @remarks
 * Codecs are pure and deterministic apart from logging: encoding the same value
 * twice yields the same bytes.
 *
 * @example
 * ```ts
 * const userCodec = createRencodeCodec(shapes.record({ name: shapes.string, code: shapes.i32 }))
 * const bytes = userCodec.encode({ name: "bob", code: -133 })
 * userCodec.decode(bytes) // { name: "bob", code: -133 }
 * ```
 */
export interface Codec<T> {
  encode(value: T): Uint8Array
  decode(bytes: Uint8Array): T
}
