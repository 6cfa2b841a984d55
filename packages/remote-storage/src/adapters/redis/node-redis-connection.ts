import type { Clock, Milliseconds } from "@relaycache/clock"
import type { Logger } from "@relaycache/logger"
import { ConnectionTimeoutError, ErrorReply } from "redis"
import { RemoteStorageError } from "../../core/errors"
import type {
  RedisArgument,
  RedisConnection,
  RedisConnector,
  RedisReply,
} from "../../ports/redis-connection"
import {
  BYTES_TYPE_MAPPING,
  createRedisBytesClient,
  type RedisBytesClient,
} from "./redis-client"

export type NodeRedisConnectionDeps = {
  client: RedisBytesClient
  clock: Clock
  logger: Logger
}

const TIMED_OUT = Symbol("timed-out")

/**
 * {@link RedisConnection} over a node-redis client.
 *
 * @remarks
 * node-redis's `timeout` command option only drops commands not yet written to
 * the socket, so the operation timeout races each command against
 * `clock.sleep`. The losing command keeps running; its late reply is logged
 * and dropped.
 */
export class NodeRedisConnection implements RedisConnection {
  private readonly client: RedisBytesClient
  private readonly clock: Clock
  private readonly logger: Logger
  private operationTimeoutMs: Milliseconds | undefined

  constructor(deps: NodeRedisConnectionDeps) {
    this.client = deps.client
    this.clock = deps.clock
    this.logger = deps.logger

    this.client.on("error", (err) => {
      this.logger.debug("Redis client error", { err })
    })
  }

  get isReady(): boolean {
    return this.client.isReady
  }

  async open(): Promise<void> {
    try {
      await this.client.connect()
    } catch (err) {
      throw toConnectError(err)
    }
  }

  async reconnect(): Promise<void> {
    if (this.client.isOpen) this.client.destroy()

    await this.open()
  }

  setOperationTimeout(ms: Milliseconds): void {
    if (!Number.isInteger(ms) || ms <= 0) {
      throw new RangeError(`Operation timeout must be a positive integer, got ${ms}`)
    }

    this.operationTimeoutMs = ms
  }

  async command(args: readonly RedisArgument[]): Promise<RedisReply> {
    const pending = this.client
      .sendCommand(args.map(toWireArgument), { typeMapping: BYTES_TYPE_MAPPING })
      .then(toRedisReply, toReplyOrFailure)

    const timeoutMs = this.operationTimeoutMs

    if (timeoutMs === undefined) return pending

    const controller = new AbortController()
    const deadline = this.clock
      .sleep(timeoutMs, controller.signal)
      .then((): typeof TIMED_OUT => TIMED_OUT)

    try {
      const winner = await Promise.race([pending, deadline])

      if (winner === TIMED_OUT) {
        this.dropLateReply(pending, commandName(args))

        throw new RemoteStorageError("timeout", `Redis ${commandName(args)} timed out`, {
          context: { timeoutMs },
        })
      }

      return winner
    } finally {
      controller.abort()
    }
  }

  async close(): Promise<void> {
    if (this.client.isOpen) this.client.destroy()
  }

  private dropLateReply(pending: Promise<RedisReply>, operation: string): void {
    void pending.then(
      (reply) => {
        this.logger.debug("Dropped late Redis reply", { operation, reply: reply.type })
      },
      (err: unknown) => {
        this.logger.debug("Dropped late Redis failure", { operation, err })
      },
    )
  }
}

export type NodeRedisConnectorDeps = {
  clock: Clock
  logger: Logger
}

export function createNodeRedisConnector(deps: NodeRedisConnectorDeps): RedisConnector {
  return {
    create: (endpoint, opts) =>
      new NodeRedisConnection({
        client: createRedisBytesClient(endpoint, opts),
        clock: deps.clock,
        logger: deps.logger,
      }),
  }
}

/** Classify a decoded node-redis reply. */
export function toRedisReply(value: unknown): RedisReply {
  if (value === null || value === undefined) return { type: "nil" }
  if (Buffer.isBuffer(value)) return { type: "string", value: new Uint8Array(value) }
  if (typeof value === "string") return { type: "status", value }
  if (typeof value === "number") return { type: "integer", value }
  if (Array.isArray(value)) return { type: "array", items: value.map(toRedisReply) }
  if (value instanceof ErrorReply) return { type: "error", message: value.message }

  return { type: "error", message: `Unsupported reply type: ${typeof value}` }
}

function toReplyOrFailure(err: unknown): RedisReply {
  if (err instanceof ErrorReply) return { type: "error", message: err.message }

  throw new RemoteStorageError("error", "No reply from Redis", { cause: err })
}

function toConnectError(err: unknown): RemoteStorageError {
  if (err instanceof ConnectionTimeoutError) {
    return new RemoteStorageError("timeout", "Redis connection timed out", { cause: err })
  }

  return new RemoteStorageError("error", "Redis connection failed", { cause: err })
}

function toWireArgument(arg: RedisArgument): string | Buffer {
  return typeof arg === "string"
    ? arg
    : Buffer.from(arg.buffer, arg.byteOffset, arg.byteLength)
}

function commandName(args: readonly RedisArgument[]): string {
  const [name] = args

  return typeof name === "string" ? name : "command"
}
