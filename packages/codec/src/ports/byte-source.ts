/**
 * A blocking source of bytes.
 *
 * @remarks
 * `read` copies up to `target.length` bytes into `target` and returns how many
 * it wrote. Returning 0 means the input is exhausted; a short read does not.
 * Anything the source throws reaches the caller as an `io_error`.
 */
export interface ByteSource {
  read(target: Uint8Array): number
}
