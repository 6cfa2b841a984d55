import { EnvSource, type IConfig, loadConfig, ObjectSource } from "@relaycache/config"
import {
  createPinoLogger,
  type Logger,
  type LogLevelName,
  type PinoLoggerDeps,
} from "@relaycache/logger"
import { parseStorageEntries, type StorageEntry } from "../core/storage-entry"
import { type RemoteStorageEnv, remoteStorageEnvSchema } from "./schema"

export const ENV_PREFIX = "RELAYCACHE_"

export type LoggingConfig = {
  level: LogLevelName
  prettify: boolean
}

export type RemoteStorageConfig = {
  storages: StorageEntry[]
  logging: LoggingConfig
  /** Provenance of the underlying values. */
  source: IConfig<RemoteStorageEnv>
}

export type LoadRemoteStorageConfigOptions = {
  env?: Record<string, string | undefined>
  /** Applied over the environment, keyed without the prefix. */
  overrides?: Record<string, string>
}

/**
 * Read remote storage and logging settings from `RELAYCACHE_*` variables.
 *
 * @throws {ConfigValidationError} when a variable has an invalid value
 * @throws {RemoteStorageConfigError} when a storage entry is malformed
 */
export async function loadRemoteStorageConfig(
  options: LoadRemoteStorageConfigOptions = {},
): Promise<RemoteStorageConfig> {
  const config = await loadConfig({
    schema: remoteStorageEnvSchema,
    sources: [
      new EnvSource({ prefix: ENV_PREFIX, ...(options.env && { env: options.env }) }),
      ...(options.overrides ? [new ObjectSource(options.overrides)] : []),
    ],
  })

  return {
    storages: parseStorageEntries(config.value.REMOTE_STORAGE),
    logging: { level: config.value.LOG_LEVEL, prettify: config.value.LOG_PRETTY },
    source: config,
  }
}

export const PASSWORD_REDACT_PATHS = ["password", "*.password"] as const

export function createLogger(
  logging: LoggingConfig,
  destination?: PinoLoggerDeps["destination"],
): Logger {
  return createPinoLogger(
    destination ? { destination } : {},
    { ...logging, redact: PASSWORD_REDACT_PATHS },
    { service: "relaycache" },
  )
}
