export type ErrorCode = Lowercase<string>

/**
 * Structured details attached to an error (keys, endpoints, attribute names).
 * Serialized verbatim into logs, so it never carries credentials.
 */
export type ErrorContext = Readonly<Record<string, unknown>>

export interface AppError extends Error {
  readonly code: ErrorCode
  readonly context: ErrorContext

  /** Whether the same call may succeed if tried again. */
  readonly isRetryable: boolean

  /**
   * `true` for runtime failures the caller should expect (unreachable server,
   * timeout, rejected credentials); `false` for bugs.
   */
  readonly isOperational: boolean

  readonly timestamp: Date
  readonly cause?: unknown
}

/** Log-friendly shape produced by `serializeError`. */
export type SerializedError = Readonly<{
  name: string
  code: string
  message: string
  context: Record<string, unknown>
  timestamp: string
  isRetryable: boolean
  isOperational: boolean
  cause?: SerializedError
  stack?: string
}>
