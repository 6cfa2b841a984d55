import { type ZodType, z } from "zod"
import { EnvSource } from "../adapters/env/env-source"
import type { IConfig } from "../ports/config"
import type { ConfigSource } from "../ports/source"
import { Config } from "./config"
import { ConfigValidationError } from "./errors"

export type LoadConfigOptions<T extends Record<string, unknown>> = {
  schema: ZodType<T>
  /** Applied in order, later sources winning. Defaults to the raw environment. */
  sources?: ConfigSource[]
}

type Merged = {
  values: Record<string, unknown>
  provenance: Map<string, string>
}

async function mergeSources(sources: readonly ConfigSource[]): Promise<Merged> {
  const values: Record<string, unknown> = {}
  const provenance = new Map<string, string>()

  for (const source of sources) {
    for (const [key, value] of Object.entries(await source.load())) {
      if (value === undefined) continue

      values[key] = value
      provenance.set(key, source.name)
    }
  }

  return { values, provenance }
}

function formatIssue(issue: { path: readonly PropertyKey[]; message: string }): string {
  const path = issue.path.map(String).join(".")

  return `${path || "(root)"}: ${issue.message}`
}

/**
 * @throws {ConfigValidationError} when the merged values do not satisfy `schema`
 */
export async function loadConfig<T extends Record<string, unknown>>({
  schema,
  sources = [new EnvSource()],
}: LoadConfigOptions<T>): Promise<IConfig<T>> {
  const { values, provenance } = await mergeSources(sources)
  const result = schema.safeParse(values)

  if (!result.success) {
    throw new ConfigValidationError(
      `Configuration validation failed:\n${z.prettifyError(result.error)}`,
      result.error.issues.map(formatIssue),
      result.error,
    )
  }

  return new Config<T>(
    result.data,
    Object.fromEntries(provenance),
    new Set(Object.keys(values)),
  )
}
