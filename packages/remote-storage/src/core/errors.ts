import { BaseError, type ErrorContext } from "@relaycache/errors"

/**
 * How a runtime operation failed.
 *
 * - `timeout`: connect or command deadline elapsed. Retryable.
 * - `error`: anything else (refused, closed link, error reply, odd reply).
 */
export type RemoteStorageFailure = "timeout" | "error"

export type RemoteStorageErrorOptions = {
  context?: ErrorContext
  cause?: unknown
}

export class RemoteStorageError extends BaseError<RemoteStorageFailure> {
  constructor(
    code: RemoteStorageFailure,
    message: string,
    options: RemoteStorageErrorOptions = {},
  ) {
    super(message, {
      code,
      context: options.context,
      cause: options.cause,
      isRetryable: code === "timeout",
    })
  }
}

export type RemoteStorageConfigErrorCode =
  | "invalid_config"
  | "invalid_digest"
  | "invalid_entry"
  | "unsupported_scheme"

/** Thrown while building a storage from its configuration. Never at runtime. */
export class RemoteStorageConfigError extends BaseError<RemoteStorageConfigErrorCode> {
  constructor(
    code: RemoteStorageConfigErrorCode,
    message: string,
    options: RemoteStorageErrorOptions = {},
  ) {
    super(message, { code, context: options.context, cause: options.cause })
  }
}

/**
 * Normalize anything a connection rejected with.
 *
 * Errors that are already a {@link RemoteStorageError} pass through; anything
 * else becomes an `error` failure with the original as `cause`.
 */
export function toRemoteStorageError(err: unknown, message: string): RemoteStorageError {
  if (err instanceof RemoteStorageError) return err

  return new RemoteStorageError("error", message, { cause: err })
}
