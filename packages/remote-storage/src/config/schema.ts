import { logLevelNames } from "@relaycache/logger"
import { z } from "zod"

/** Environment variables, without the `RELAYCACHE_` prefix. */
export const remoteStorageEnvSchema = z.object({
  REMOTE_STORAGE: z.string().default(""),
  LOG_LEVEL: z.enum(logLevelNames).default("warn"),
  LOG_PRETTY: z.stringbool().default(false),
})

export type RemoteStorageEnv = z.infer<typeof remoteStorageEnvSchema>
