import type { ByteSource } from "../../ports/byte-source"

/** Reads from an in-memory byte array. */
export class BufferSource implements ByteSource {
  private position = 0

  constructor(private readonly bytes: Uint8Array) {}

  /** Bytes not yet read. */
  get remaining(): number {
    return this.bytes.length - this.position
  }

  read(target: Uint8Array): number {
    const n = Math.min(target.length, this.remaining)
    target.set(this.bytes.subarray(this.position, this.position + n))
    this.position += n
    return n
  }
}
