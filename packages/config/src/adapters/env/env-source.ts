import type { ConfigSource } from "../../ports/source"

export type EnvSourceOptions = {
  /** Only read variables starting with this; it is stripped from the keys. */
  prefix?: string
  /** Defaults to `process.env`. */
  env?: Record<string, string | undefined>
}

/** Environment variables, optionally narrowed to one prefix. */
export class EnvSource implements ConfigSource {
  readonly name: string
  private readonly prefix: string
  private readonly env: Record<string, string | undefined>

  constructor(options: EnvSourceOptions = {}) {
    this.prefix = options.prefix ?? ""
    this.env = options.env ?? process.env
    this.name = this.prefix ? `env:${this.prefix}*` : "env"
  }

  async load(): Promise<Record<string, unknown>> {
    const values: Record<string, string | undefined> = {}

    for (const [key, value] of Object.entries(this.env)) {
      if (key.startsWith(this.prefix)) values[key.slice(this.prefix.length)] = value
    }

    return values
  }
}
