/**
 * A source of codec option values.
 *
 * A source only *loads* raw values; coercion and validation happen in
 * `loadCodecOptions`. Sources are applied in order, later ones overriding
 * earlier ones. Returning undefined for a key means "not provided".
 */
export interface ConfigSource {
  /** Name used for provenance, e.g. "env" or "object:overrides". */
  readonly name: string

  load(): Promise<Record<string, unknown>>
}
