import type { Milliseconds } from "@relaycache/clock"
import { z } from "zod"
import { RemoteStorageConfigError } from "./errors"

export const DEFAULT_CONNECT_TIMEOUT_MS: Milliseconds = 100
export const DEFAULT_OPERATION_TIMEOUT_MS: Milliseconds = 10_000
export const MAX_TIMEOUT_MS: Milliseconds = 3_600_000

const timeoutMs = z
  .string()
  .regex(/^\d+$/, "expected a whole number of milliseconds")
  .transform(Number)
  .pipe(z.number().int().min(1).max(MAX_TIMEOUT_MS))

const redisAttributesSchema = z.object({
  "connect-timeout": timeoutMs.optional(),
  "operation-timeout": timeoutMs.optional(),
  username: z.string().min(1).optional(),
  password: z.string().optional(),
})

const knownAttributes = new Set(Object.keys(redisAttributesSchema.shape))

export type RedisCredentials = {
  username?: string
  password?: string
}

export type RedisSettings = RedisCredentials & {
  connectTimeoutMs: Milliseconds
  operationTimeoutMs: Milliseconds
}

export type RedisAttributes = RedisSettings & {
  /** Attribute names the Redis backend does not understand. */
  unknownAttributes: string[]
}

/**
 * Validate the attributes of a `redis` storage entry.
 *
 * Credentials given as attributes win over the URL's userinfo.
 *
 * @throws {RemoteStorageConfigError} `invalid_config` with zod's prettified message
 */
export function parseRedisAttributes(
  attributes: Readonly<Record<string, string>>,
  url: string,
): RedisAttributes {
  const result = redisAttributesSchema.safeParse(attributes)

  if (!result.success) {
    throw new RemoteStorageConfigError("invalid_config", z.prettifyError(result.error), {
      context: { attributes: result.error.issues.map((i) => i.path.map(String).join(".")) },
      cause: result.error,
    })
  }

  const fromUrl = credentialsFromUrl(url)
  const username = result.data.username ?? fromUrl.username
  const password = result.data.password ?? fromUrl.password

  return {
    connectTimeoutMs: result.data["connect-timeout"] ?? DEFAULT_CONNECT_TIMEOUT_MS,
    operationTimeoutMs: result.data["operation-timeout"] ?? DEFAULT_OPERATION_TIMEOUT_MS,
    ...(username !== undefined && { username }),
    ...(password !== undefined && { password }),
    unknownAttributes: Object.keys(attributes).filter((name) => !knownAttributes.has(name)),
  }
}

function credentialsFromUrl(url: string): RedisCredentials {
  if (!URL.canParse(url)) return {}

  const parsed = new URL(url)

  return {
    ...(parsed.username ? { username: safeDecode(parsed.username) } : {}),
    ...(parsed.password ? { password: safeDecode(parsed.password) } : {}),
  }
}

function safeDecode(component: string): string {
  try {
    return decodeURIComponent(component)
  } catch (err) {
    if (err instanceof URIError) return component
    throw err
  }
}
