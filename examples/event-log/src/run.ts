import { EnvSource, loadCodecOptions } from "@rencode/codec"
import { createPinoLogger } from "@rencode/logger"
import { EventLog } from "./event-log"

export type RunOptions = {
  env?: NodeJS.ProcessEnv
}

export async function run(options: RunOptions = {}): Promise<void> {
  const logger = createPinoLogger({}, { level: "debug" }, { service: "event-log" })
  const loaded = await loadCodecOptions({ sources: [new EnvSource({ env: options.env ?? process.env })] })

  logger.info("Codec options loaded", { sources: loaded.sourcesUsed(), unknownKeys: loaded.unknownKeys() })

  const log = new EventLog(logger, loaded.value)
  log.append({ id: 1, actor: "alice", action: "login", at: 1_700_000_000_000n, tags: [] })
  log.append({ id: 2, actor: "alice", action: "upload", at: 1_700_000_060_000n, tags: ["image"], note: "avatar" })

  for (const event of log.replay()) {
    logger.info("Replayed event", { id: event.id, action: event.action })
  }

  logger.info("Event log written", { bytes: log.size })
}
