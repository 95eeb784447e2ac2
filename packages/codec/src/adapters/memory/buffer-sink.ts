import type { ByteSink } from "../../ports/byte-sink"

const INITIAL_CAPACITY = 64

/** Collects written bytes in a growable buffer. */
export class BufferSink implements ByteSink {
  private buffer: Uint8Array
  private length = 0

  constructor(initialCapacity = INITIAL_CAPACITY) {
    this.buffer = new Uint8Array(Math.max(1, initialCapacity))
  }

  get size(): number {
    return this.length
  }

  write(bytes: Uint8Array): void {
    this.grow(bytes.length)
    this.buffer.set(bytes, this.length)
    this.length += bytes.length
  }

  /** A copy of everything written so far. */
  toBytes(): Uint8Array {
    return this.buffer.slice(0, this.length)
  }

  private grow(needed: number): void {
    if (this.length + needed <= this.buffer.length) return

    let capacity = this.buffer.length * 2
    while (capacity < this.length + needed) capacity *= 2

    const next = new Uint8Array(capacity)
    next.set(this.buffer.subarray(0, this.length))
    this.buffer = next
  }
}
