import type { Emitter } from "./emitter"
import type { Visitor } from "./visitor"

/**
 * A typed value's two halves of the visitation contract: how to emit a `T`
 * and how to build one back.
 */
export interface Shape<T> {
  readonly name: string
  /** Record fields with an optional shape may be absent. */
  readonly optional?: boolean
  readonly visitor: Visitor<T>
  write(emitter: Emitter, value: T): void
}

export type ShapeType<S> = S extends Shape<infer T> ? T : never
