import { EnvSource } from "../../adapters/env/env-source"
import type { ConfigSource } from "../../ports/config-source"
import { type CodecOptionKey, type CodecOptions, codecOptionKeys, parseCodecOptions } from "./codec-options"

export type LoadCodecOptionsArgs = {
  /** Applied in order, later ones overriding earlier. Defaults to `[new EnvSource()]`. */
  sources?: ConfigSource[]
}

/** Validated options plus where each value came from. */
export interface LoadedCodecOptions {
  readonly value: Readonly<CodecOptions>

  /** The source that provided `key`, or "default". */
  explain(key: CodecOptionKey): string

  /** Names of the sources that provided at least one option. */
  sourcesUsed(): string[]

  /** Keys sources provided that are not codec options. */
  unknownKeys(): string[]
}

export async function loadCodecOptions({ sources }: LoadCodecOptionsArgs = {}): Promise<LoadedCodecOptions> {
  const merged = new Map<string, unknown>()
  const provenance = new Map<string, string>()

  for (const source of sources ?? [new EnvSource()]) {
    const values = await source.load()

    for (const [key, value] of Object.entries(values)) {
      if (value !== undefined) {
        merged.set(key, value)
        provenance.set(key, source.name)
      }
    }
  }

  const value = parseCodecOptions(Object.fromEntries(merged))
  const known = new Set<string>(codecOptionKeys)

  return {
    value,
    explain: (key) => provenance.get(key) ?? "default",
    sourcesUsed: () => [...new Set([...provenance].filter(([key]) => known.has(key)).map(([, name]) => name))],
    unknownKeys: () => [...merged.keys()].filter((key) => !known.has(key)),
  }
}
