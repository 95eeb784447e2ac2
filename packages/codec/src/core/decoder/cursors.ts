import type { DictAccess, ListAccess, Next, Visitor } from "../../ports/visitor"
import { RencodeError } from "../errors"

/** What a container cursor needs from the decoder that owns it. */
export interface ElementReader {
  position(): number
  readonly maxContainerLength: number
  readElement<T>(visitor: Visitor<T>): T
  /** Consumes the next byte when it is a terminator. */
  takeTerminator(): boolean
}

const DONE = { done: true } as const

/**
 * Element counting shared by list and dict cursors. Fixed-count containers stop
 * after `sizeHint` elements, open ones at the terminator.
 */
abstract class Cursor {
  protected taken = 0
  protected finished = false

  constructor(
    protected readonly reader: ElementReader,
    readonly sizeHint: number | undefined,
    private readonly container: "list" | "dict",
  ) {}

  protected hasNext(): boolean {
    if (this.finished) return false

    if (this.sizeHint !== undefined) {
      if (this.taken < this.sizeHint) return true
    } else if (!this.reader.takeTerminator()) {
      if (this.taken >= this.reader.maxContainerLength) {
        throw RencodeError.limitExceeded("maxContainerLength", this.reader.maxContainerLength, {
          offset: this.reader.position(),
        })
      }
      return true
    }

    this.finished = true
    return false
  }

  /** Called once the visitor returns; the container must have been read to its end. */
  end(): void {
    if (this.finished || this.isComplete()) return
    throw RencodeError.unconsumed(this.container, this.reader.position())
  }

  protected isComplete(): boolean {
    if (this.sizeHint !== undefined) return this.taken === this.sizeHint
    return this.reader.takeTerminator()
  }
}

export class ListCursor extends Cursor implements ListAccess {
  constructor(reader: ElementReader, sizeHint: number | undefined) {
    super(reader, sizeHint, "list")
  }

  next<E>(visitor: Visitor<E>): Next<E> {
    if (!this.hasNext()) return DONE

    this.taken++
    return { done: false, value: this.reader.readElement(visitor) }
  }
}

export class DictCursor extends Cursor implements DictAccess {
  private awaitingValue = false

  constructor(reader: ElementReader, sizeHint: number | undefined) {
    super(reader, sizeHint, "dict")
  }

  nextKey<K>(visitor: Visitor<K>): Next<K> {
    if (this.awaitingValue) throw RencodeError.invalidState("nextKey() called before the previous value was read")
    if (!this.hasNext()) return DONE

    this.taken++
    const key = this.reader.readElement(visitor)
    this.awaitingValue = true
    return { done: false, value: key }
  }

  nextValue<V>(visitor: Visitor<V>): V {
    if (!this.awaitingValue) throw RencodeError.invalidState("nextValue() called without a key")

    this.awaitingValue = false
    return this.reader.readElement(visitor)
  }

  protected override isComplete(): boolean {
    return !this.awaitingValue && super.isComplete()
  }
}
