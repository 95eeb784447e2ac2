/**
 * Consumer side of the visitation contract: a target shape is built from the
 * notifications the decoder sends it.
 *
 * @remarks
 * Every method is optional. When the decoder meets a payload the visitor has
 * no method for, it fails with `type_mismatch`, quoting `expecting`.
 *
 * Fallbacks:
 * - `visitI8`/`visitI16`/`visitI32` fall back to `visitI64`
 * - `visitF32` falls back to `visitF64`
 *
 * Embedded small integers arrive through `visitI8`.
 */
export interface Visitor<T> {
  /** What this visitor wants, used in mismatch messages, e.g. "a boolean". */
  readonly expecting: string

  visitNone?(): T
  visitBool?(value: boolean): T
  visitI8?(value: number): T
  visitI16?(value: number): T
  visitI32?(value: number): T
  visitI64?(value: bigint): T
  visitF32?(value: number): T
  visitF64?(value: number): T
  visitString?(value: string): T
  visitList?(access: ListAccess): T
  visitDict?(access: DictAccess): T
}

export type Next<T> = { done: false; value: T } | { done: true }

/**
 * Cursor over the elements of a list being decoded.
 *
 * A visitor must pull until `done` (or exactly `sizeHint` times); leaving
 * elements behind fails the decode with `length_mismatch`.
 */
export interface ListAccess {
  /** Element count for fixed-count lists, undefined for terminator-closed ones. */
  readonly sizeHint: number | undefined
  next<E>(visitor: Visitor<E>): Next<E>
}

/**
 * Cursor over the entries of a dict being decoded. Each successful `nextKey`
 * must be followed by exactly one `nextValue`.
 */
export interface DictAccess {
  /** Pair count for fixed-count dicts, undefined for terminator-closed ones. */
  readonly sizeHint: number | undefined
  nextKey<K>(visitor: Visitor<K>): Next<K>
  nextValue<V>(visitor: Visitor<V>): V
}
