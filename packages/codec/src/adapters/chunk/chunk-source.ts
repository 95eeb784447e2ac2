import type { ByteSource } from "../../ports/byte-source"

/**
 * Reads across a sequence of chunks, such as the pieces of a message that
 * arrived separately. Empty chunks are skipped.
 */
export class ChunkSource implements ByteSource {
  private readonly chunks: Iterator<Uint8Array>
  private current: Uint8Array = new Uint8Array(0)

  constructor(chunks: Iterable<Uint8Array>) {
    this.chunks = chunks[Symbol.iterator]()
  }

  read(target: Uint8Array): number {
    while (this.current.length === 0) {
      const next = this.chunks.next()
      if (next.done) return 0
      this.current = next.value
    }

    const n = Math.min(target.length, this.current.length)
    target.set(this.current.subarray(0, n))
    this.current = this.current.subarray(n)
    return n
  }
}
