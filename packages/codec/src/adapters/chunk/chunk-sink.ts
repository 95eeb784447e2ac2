import type { ByteSink } from "../../ports/byte-sink"

/** Hands every write to a callback, as it happens. */
export class ChunkSink implements ByteSink {
  constructor(private readonly onChunk: (chunk: Uint8Array) => void) {}

  write(bytes: Uint8Array): void {
    this.onChunk(bytes)
  }
}
