/**
 * A blocking destination for encoded bytes.
 *
 * The encoder never reuses a buffer it has handed to `write`, so sinks may keep
 * the reference.
 */
export interface ByteSink {
  write(bytes: Uint8Array): void
}
