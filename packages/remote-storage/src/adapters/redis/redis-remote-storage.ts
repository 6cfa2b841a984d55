import type { Clock } from "@relaycache/clock"
import type { Logger } from "@relaycache/logger"
import type { RedisSettings } from "../../core/attributes"
import type { Digest } from "../../core/digest"
import { describeEndpoint, resolveEndpoint } from "../../core/endpoint"
import {
  type RemoteStorageFailure,
  RemoteStorageError,
  toRemoteStorageError,
} from "../../core/errors"
import { KEY_PREFIX, keyString } from "../../core/key-string"
import { redactUrl } from "../../core/storage-entry"
import type {
  RedisArgument,
  RedisConnection,
  RedisConnector,
  RedisReply,
} from "../../ports/redis-connection"
import type {
  ConnectResult,
  GetResult,
  PutResult,
  RemoteStorage,
  RemoteStorageFailed,
  RemoveResult,
} from "../../ports/remote-storage"

export type RedisRemoteStorageDeps = {
  connector: RedisConnector
  clock: Clock
  logger: Logger
}

export type RedisRemoteStorageOptions = RedisSettings & {
  url: string
}

type ConnectionState =
  | { kind: "disconnected"; previous?: RedisConnection }
  | { kind: "connected"; connection: RedisConnection }
  | { kind: "invalid" }

type Established = { kind: "connected"; connection: RedisConnection } | RemoteStorageFailed

const CONNECTED = { kind: "connected" } as const

/**
 * {@link RemoteStorage} backed by a Redis-compatible server.
 *
 * @remarks
 * - Connects lazily on first use; concurrent callers share one attempt.
 * - A dropped link is first reconnected in place, then replaced.
 * - A backend that cannot be reached on a fresh connect, or rejects its
 *   credentials, turns `invalid` and fails every later call without I/O.
 */
export class RedisRemoteStorage implements RemoteStorage {
  private readonly connector: RedisConnector
  private readonly clock: Clock
  private readonly logger: Logger
  private state: ConnectionState = { kind: "disconnected" }
  private inflight: Promise<Established> | undefined

  constructor(
    deps: RedisRemoteStorageDeps,
    private readonly opts: RedisRemoteStorageOptions,
  ) {
    this.connector = deps.connector
    this.clock = deps.clock
    this.logger = deps.logger.child({
      module: "remote-storage",
      backend: "redis",
      endpoint: redactUrl(opts.url),
    })
  }

  /** `true` once the backend has been given up on. */
  get isInvalid(): boolean {
    return this.state.kind === "invalid"
  }

  getKeyString(digest: Digest): string {
    return keyString(KEY_PREFIX, digest)
  }

  async connect(): Promise<ConnectResult> {
    const result = await this.ensureConnected()

    return result.kind === "connected" ? CONNECTED : result
  }

  async get(digest: Digest): Promise<GetResult> {
    const link = await this.ensureConnected()
    if (link.kind === "failed") return link

    const key = this.getKeyString(digest)
    const sent = await this.send(link.connection, ["GET", key], key)
    if (sent.kind === "failed") return sent

    const { reply } = sent

    switch (reply.type) {
      case "string":
        this.logger.debug("Redis GET hit", { key, bytes: reply.value.byteLength })
        return { kind: "found", value: new Uint8Array(reply.value) }
      case "nil":
        this.logger.debug("Redis GET miss", { key })
        return { kind: "not_found" }
      default:
        return this.unexpected("GET", key, reply)
    }
  }

  async put(digest: Digest, value: Uint8Array, onlyIfMissing = false): Promise<PutResult> {
    const link = await this.ensureConnected()
    if (link.kind === "failed") return link

    const key = this.getKeyString(digest)

    if (onlyIfMissing && (await this.exists(link.connection, key))) {
      this.logger.debug("Redis SET skipped: object already present", { key })
      return { kind: "skipped" }
    }

    const sent = await this.send(link.connection, ["SET", key, value], key)
    if (sent.kind === "failed") return sent

    return sent.reply.type === "status"
      ? { kind: "stored" }
      : this.unexpected("SET", key, sent.reply)
  }

  async remove(digest: Digest): Promise<RemoveResult> {
    const link = await this.ensureConnected()
    if (link.kind === "failed") return link

    const key = this.getKeyString(digest)
    const sent = await this.send(link.connection, ["DEL", key], key)
    if (sent.kind === "failed") return sent

    const { reply } = sent
    if (reply.type !== "integer") return this.unexpected("DEL", key, reply)

    return reply.value > 0 ? { kind: "removed" } : { kind: "not_found" }
  }

  async close(): Promise<void> {
    if (this.inflight) await this.inflight

    const connection = this.currentConnection()
    if (!connection) return

    if (this.state.kind !== "invalid") this.state = { kind: "disconnected" }

    this.logger.debug("Redis disconnect")
    await connection.close()
  }

  private currentConnection(): RedisConnection | undefined {
    switch (this.state.kind) {
      case "connected":
        return this.state.connection
      case "disconnected":
        return this.state.previous
      case "invalid":
        return undefined
    }
  }

  private ensureConnected(): Promise<Established> {
    if (this.inflight) return this.inflight

    if (this.state.kind === "connected") {
      const { connection } = this.state
      if (connection.isReady) return Promise.resolve({ kind: "connected", connection })

      this.logger.debug("Redis link dropped")
      this.state = { kind: "disconnected", previous: connection }
    }

    if (this.state.kind === "invalid") {
      return Promise.resolve(failed("error", "Redis backend is unusable"))
    }

    this.inflight = this.establish().finally(() => {
      this.inflight = undefined
    })

    return this.inflight
  }

  private async establish(): Promise<Established> {
    const previous = this.state.kind === "disconnected" ? this.state.previous : undefined

    if (previous) {
      const reconnected = await this.reconnectInPlace(previous)
      if (reconnected) return reconnected
    }

    return this.connectFresh()
  }

  private async reconnectInPlace(connection: RedisConnection): Promise<Established | undefined> {
    try {
      await connection.reconnect()
    } catch (err) {
      this.logger.debug("Redis reconnection failed", { err })
      this.state = { kind: "disconnected" }
      await this.closeQuietly(connection)

      return undefined
    }

    this.logger.debug("Redis reconnection OK")

    return this.onConnected(connection)
  }

  private async connectFresh(): Promise<Established> {
    const endpoint = resolveEndpoint(this.opts.url)

    if (endpoint.kind === "invalid") {
      return this.invalidate(
        new RemoteStorageError("error", `Invalid Redis endpoint: ${endpoint.reason}`),
      )
    }

    let connection: RedisConnection

    try {
      connection = this.connector.create(endpoint, {
        connectTimeoutMs: this.opts.connectTimeoutMs,
      })
    } catch (err) {
      return this.invalidate(
        new RemoteStorageError("error", "Redis connection setup failed", { cause: err }),
      )
    }

    const startedAt = this.clock.nowMs()

    this.logger.debug("Redis connecting", {
      target: describeEndpoint(endpoint),
      connectTimeoutMs: this.opts.connectTimeoutMs,
    })

    try {
      await connection.open()
    } catch (err) {
      await this.closeQuietly(connection)

      return this.invalidate(toRemoteStorageError(err, "Redis connection failed"))
    }

    this.logger.debug("Redis connection OK", { durationMs: this.clock.nowMs() - startedAt })

    return this.onConnected(connection)
  }

  private async onConnected(connection: RedisConnection): Promise<Established> {
    this.state = { kind: "connected", connection }

    try {
      connection.setOperationTimeout(this.opts.operationTimeoutMs)
    } catch (err) {
      this.logger.warn("Failed to set Redis operation timeout", {
        err,
        operationTimeoutMs: this.opts.operationTimeoutMs,
      })
    }

    return this.auth(connection)
  }

  private async auth(connection: RedisConnection): Promise<Established> {
    const { username, password } = this.opts

    if (password === undefined) return { kind: "connected", connection }

    const args: string[] =
      username === undefined ? ["AUTH", password] : ["AUTH", username, password]

    this.logger.debug(`Redis AUTH ${username ?? "default"} *******`)

    let reply: RedisReply

    try {
      reply = await connection.command(args)
    } catch (err) {
      await this.closeQuietly(connection)

      return this.invalidate(
        new RemoteStorageError("error", "Redis AUTH failed: no reply", { cause: err }),
      )
    }

    if (reply.type === "error") {
      await this.closeQuietly(connection)

      return this.invalidate(
        new RemoteStorageError("error", `Redis AUTH failed: ${reply.message}`),
      )
    }

    return { kind: "connected", connection }
  }

  private exists(connection: RedisConnection, key: string): Promise<boolean> {
    return this.send(connection, ["EXISTS", key], key).then((sent) => {
      if (sent.kind === "reply" && sent.reply.type === "integer") return sent.reply.value > 0

      this.logger.warn("Redis EXISTS check failed, storing anyway", {
        key,
        ...(sent.kind === "failed" ? { err: sent.error } : { reply: sent.reply.type }),
      })

      return false
    })
  }

  private async send(
    connection: RedisConnection,
    args: readonly RedisArgument[],
    key: string,
  ): Promise<Sent> {
    const [operation] = args
    const startedAt = this.clock.nowMs()

    this.logger.debug(`Redis ${String(operation)} ${key}`)

    try {
      const reply = await connection.command(args)

      if (reply.type === "error") {
        this.logger.warn(`Redis ${String(operation)} error reply`, {
          key,
          reply: reply.message,
        })
      }

      return { kind: "reply", reply }
    } catch (err) {
      const error = toRemoteStorageError(err, "No reply from Redis")

      this.logger.warn(`Redis ${String(operation)} failed`, {
        key,
        err: error,
        durationMs: this.clock.nowMs() - startedAt,
      })

      return { kind: "failed", error }
    }
  }

  private unexpected(operation: string, key: string, reply: RedisReply): RemoteStorageFailed {
    const message =
      reply.type === "error"
        ? `Redis ${operation} failed: ${reply.message}`
        : `Unexpected reply to Redis ${operation}: ${reply.type}`

    if (reply.type !== "error") this.logger.warn(message, { key })

    return failed("error", message, { key })
  }

  private invalidate(error: RemoteStorageError): RemoteStorageFailed {
    this.state = { kind: "invalid" }
    this.logger.warn("Redis backend disabled", { err: error })

    return { kind: "failed", error }
  }

  private async closeQuietly(connection: RedisConnection): Promise<void> {
    try {
      await connection.close()
    } catch (err) {
      this.logger.debug("Failed to close Redis connection", { err })
    }
  }
}

type Sent = { kind: "reply"; reply: RedisReply } | RemoteStorageFailed

function failed(
  code: RemoteStorageFailure,
  message: string,
  context?: Record<string, unknown>,
): RemoteStorageFailed {
  return {
    kind: "failed",
    error: new RemoteStorageError(code, message, context ? { context } : {}),
  }
}
