import type { ConfigSource } from "../../ports/config-source"

export type EnvSourceOptions = {
  /** Defaults to "RENCODE_". Pass "" to read every variable. */
  prefix?: string
  env?: Record<string, string | undefined>
}

/**
 * Reads codec options from environment variables. `RENCODE_MAX_DEPTH`
 * becomes `maxDepth`.
 */
export class EnvSource implements ConfigSource {
  readonly name = "env"
  private readonly prefix: string
  private readonly env: Record<string, string | undefined>

  constructor(options: EnvSourceOptions = {}) {
    this.prefix = options.prefix ?? "RENCODE_"
    this.env = options.env ?? process.env
  }

  async load(): Promise<Record<string, unknown>> {
    const filtered: [string, string | undefined][] = []

    for (const [key, value] of Object.entries(this.env)) {
      if (key.startsWith(this.prefix) && key.length > this.prefix.length) {
        filtered.push([toCamelCase(key.slice(this.prefix.length)), value])
      }
    }

    return Object.fromEntries(filtered)
  }
}

function toCamelCase(key: string): string {
  return key.toLowerCase().replace(/_([a-z0-9])/g, (_, c: string) => c.toUpperCase())
}
