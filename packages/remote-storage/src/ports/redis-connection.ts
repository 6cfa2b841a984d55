import type { Milliseconds } from "@relaycache/clock"
import type { RedisEndpoint } from "../core/endpoint"

export type RedisArgument = string | Uint8Array

/** A decoded server reply. Bulk strings stay bytes. */
export type RedisReply =
  | { type: "status"; value: string }
  | { type: "integer"; value: number }
  | { type: "string"; value: Uint8Array }
  | { type: "nil" }
  | { type: "error"; message: string }
  | { type: "array"; items: RedisReply[] }

/**
 * One link to a Redis-compatible server.
 *
 * @remarks
 * `open`, `reconnect` and `command` reject with a `RemoteStorageError` when
 * no reply arrived: `timeout` when a deadline elapsed first, `error`
 * otherwise. A reply the server sent, error replies included, resolves.
 */
export interface RedisConnection {
  /** `false` once the link dropped or was closed. */
  readonly isReady: boolean

  open(): Promise<void>

  /** Re-establish the same link in place after it dropped. */
  reconnect(): Promise<void>

  /** Deadline applied to every subsequent `command`. */
  setOperationTimeout(ms: Milliseconds): void

  command(args: readonly RedisArgument[]): Promise<RedisReply>

  close(): Promise<void>
}

export type RedisConnectOptions = {
  connectTimeoutMs: Milliseconds
}

export interface RedisConnector {
  /** Build an unopened connection. Throws when no handle can be created. */
  create(endpoint: RedisEndpoint, opts: RedisConnectOptions): RedisConnection
}
