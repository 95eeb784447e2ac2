import { ChunkSink, ChunkSource, type CodecOptionsInput, Decoder, Encoder } from "@rencode/codec"
import type { Logger } from "@rencode/logger"
import { type AuditEvent, auditEvent } from "./event.model"

/**
 * An append-only log of audit events, kept as concatenated rencode values.
 * An append commits only after its event is fully encoded.
 */
export class EventLog {
  private readonly chunks: Uint8Array[] = []
  private byteLength = 0

  constructor(
    private readonly logger: Logger,
    private readonly options: CodecOptionsInput = {},
  ) {}

  get size(): number {
    return this.byteLength
  }

  append(event: AuditEvent): void {
    const pending: Uint8Array[] = []
    let bytes = 0
    const encoder = new Encoder(
      new ChunkSink((chunk) => {
        pending.push(chunk)
        bytes += chunk.length
      }),
      this.options,
    )

    auditEvent.write(encoder, event)
    encoder.finish()

    this.chunks.push(...pending)
    this.byteLength += bytes

    this.logger.debug("Appended event", { id: event.id, bytes })
  }

  *replay(): Generator<AuditEvent, void, undefined> {
    const decoder = new Decoder(new ChunkSource(this.chunks), this.options)

    while (!decoder.atEnd()) {
      yield decoder.decode(auditEvent.visitor)
    }
  }
}
