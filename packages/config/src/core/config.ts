import type { IConfig } from "../ports/config"

const FROM_DEFAULT = "default"

/** Frozen, validated settings and the source each one came from. */
export class Config<T extends Record<string, unknown>> implements IConfig<T> {
  readonly value: T
  private readonly origins: ReadonlyMap<string, string>
  private readonly unknown: readonly string[]

  constructor(
    data: T,
    provenance: Readonly<Record<string, string>>,
    providedKeys: ReadonlySet<string>,
  ) {
    Object.freeze(data)

    this.value = data
    this.origins = new Map(Object.entries(provenance))
    this.unknown = [...providedKeys].filter((key) => !Object.hasOwn(data, key))
  }

  keys(): (keyof T & string)[] {
    return Object.keys(this.value) as Array<keyof T & string>
  }

  explain<K extends keyof T & string>(key: K): string {
    return this.origins.get(key) ?? FROM_DEFAULT
  }

  sourcesUsed(): string[] {
    return [...new Set(this.origins.values())]
  }

  unknownKeys(): string[] {
    return [...this.unknown]
  }
}
