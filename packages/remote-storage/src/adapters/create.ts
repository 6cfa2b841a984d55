import { type Clock, SystemClock } from "@relaycache/clock"
import { createNullLogger, type Logger } from "@relaycache/logger"
import { parseRedisAttributes } from "../core/attributes"
import { RemoteStorageConfigError } from "../core/errors"
import { parseStorageEntry, redactUrl, type StorageEntry } from "../core/storage-entry"
import type { RedisConnector } from "../ports/redis-connection"
import { createNodeRedisConnector } from "./redis/node-redis-connection"
import { RedisRemoteStorage } from "./redis/redis-remote-storage"

export type CreateRemoteStorageDeps = {
  clock?: Clock
  logger?: Logger
  /** Overrides the node-redis connector (tests, alternative clients). */
  connector?: RedisConnector
}

/**
 * Build the storage an entry describes.
 *
 * @throws {RemoteStorageConfigError} when the entry, its scheme or its
 * attributes are invalid
 */
export function createRemoteStorage(
  entry: string | StorageEntry,
  deps: CreateRemoteStorageDeps = {},
): RedisRemoteStorage {
  const parsed = typeof entry === "string" ? parseStorageEntry(entry) : entry

  if (parsed.scheme !== "redis") {
    throw new RemoteStorageConfigError(
      "unsupported_scheme",
      `Unsupported remote storage scheme: ${parsed.scheme}`,
      { context: { url: redactUrl(parsed.url), scheme: parsed.scheme } },
    )
  }

  const { unknownAttributes, ...settings } = parseRedisAttributes(
    parsed.attributes,
    parsed.url,
  )

  const clock = deps.clock ?? new SystemClock()
  const logger = deps.logger ?? createNullLogger()

  if (unknownAttributes.length > 0) {
    logger.debug("Ignoring unknown remote storage attributes", {
      endpoint: redactUrl(parsed.url),
      attributes: unknownAttributes,
    })
  }

  return new RedisRemoteStorage(
    {
      clock,
      logger,
      connector: deps.connector ?? createNodeRedisConnector({ clock, logger }),
    },
    { url: parsed.url, ...settings },
  )
}

export function createRemoteStorages(
  entries: readonly (string | StorageEntry)[],
  deps: CreateRemoteStorageDeps = {},
): RedisRemoteStorage[] {
  return entries.map((entry) => createRemoteStorage(entry, deps))
}
