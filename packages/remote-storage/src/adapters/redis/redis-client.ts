import { createClient, RESP_TYPES } from "redis"
import type { RedisConnectOptions } from "../../ports/redis-connection"
import type { RedisEndpoint } from "../../core/endpoint"

export const BYTES_TYPE_MAPPING = {
  [RESP_TYPES.BLOB_STRING]: Buffer,
} as const

/**
 * The slice of the node-redis client this package drives.
 *
 * Commands go through `sendCommand` so replies keep their wire shape.
 */
export type RedisBytesClient = {
  readonly isOpen: boolean
  readonly isReady: boolean

  connect(): Promise<unknown>
  destroy(): void

  sendCommand(
    args: readonly (string | Buffer)[],
    options?: { typeMapping?: typeof BYTES_TYPE_MAPPING },
  ): Promise<unknown>

  on(event: "error", listener: (err: unknown) => void): unknown
}

/**
 * Create an unopened client for `endpoint`.
 *
 * @remarks
 * Automatic reconnection and the offline queue are disabled: the storage owns
 * reconnection and a command on a dropped link must fail instead of waiting.
 */
export function createRedisBytesClient(
  endpoint: RedisEndpoint,
  opts: RedisConnectOptions,
): RedisBytesClient {
  const socket =
    endpoint.kind === "tcp"
      ? {
          host: endpoint.host,
          port: endpoint.port,
          connectTimeout: opts.connectTimeoutMs,
          reconnectStrategy: false as const,
        }
      : {
          path: endpoint.path,
          connectTimeout: opts.connectTimeoutMs,
          reconnectStrategy: false as const,
        }

  return createClient({ socket, disableOfflineQueue: true }).withTypeMapping(
    BYTES_TYPE_MAPPING,
  ) as unknown as RedisBytesClient
}
