import type { AppError, ErrorCode, ErrorContext, SerializedError } from "../ports/error"

export type BaseErrorOptions<C extends ErrorCode = ErrorCode> = Readonly<{
  code: C
  context?: ErrorContext
  cause?: unknown
  isRetryable?: boolean
  isOperational?: boolean
}>

export class BaseError<C extends ErrorCode = ErrorCode> extends Error implements AppError {
  readonly code: C
  readonly context: ErrorContext
  readonly isRetryable: boolean
  readonly isOperational: boolean
  readonly timestamp: Date

  constructor(message: string, options: BaseErrorOptions<C>) {
    super(message, { cause: options.cause })

    this.name = this.constructor.name
    this.code = options.code
    this.context = Object.freeze({ ...options.context })
    this.isRetryable = options.isRetryable ?? false
    this.isOperational = options.isOperational ?? true
    this.timestamp = new Date()

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor)
    }
  }

  toJSON(): SerializedError {
    return serializeError(this)
  }
}

export type SerializeOptions = Readonly<{
  /** Include stack traces in output. Default: false */
  includeStack?: boolean

  /**
   * Causes nested deeper than this are dropped. Default: 5
   *
   * @remarks
   * Client libraries can link errors into a cycle through `cause`.
   */
  maxCauseDepth?: number
}>

const DEFAULT_MAX_CAUSE_DEPTH = 5

/**
 * Serialize any thrown value to a {@link SerializedError}.
 *
 * - BaseError keeps its code, context and flags
 * - other Errors get code "unknown" and `isOperational: false`
 * - non-Error values are wrapped, with the value kept in context
 */
export function serializeError(err: unknown, options?: SerializeOptions): SerializedError {
  return serializeAt(err, options ?? {}, 0)
}

function serializeAt(err: unknown, options: SerializeOptions, depth: number): SerializedError {
  if (!(err instanceof Error)) {
    return {
      name: "NonErrorThrown",
      code: "unknown",
      message: typeof err === "string" ? err : "Unknown error",
      context: { value: err },
      isRetryable: false,
      isOperational: false,
      timestamp: new Date().toISOString(),
    }
  }

  const maxDepth = options.maxCauseDepth ?? DEFAULT_MAX_CAUSE_DEPTH
  const cause =
    err.cause !== undefined && depth < maxDepth
      ? serializeAt(err.cause, options, depth + 1)
      : undefined

  return {
    name: err.name,
    message: err.message,
    ...(err instanceof BaseError
      ? {
          code: err.code,
          context: { ...err.context },
          isRetryable: err.isRetryable,
          isOperational: err.isOperational,
          timestamp: err.timestamp.toISOString(),
        }
      : {
          code: "unknown",
          context: {},
          isRetryable: false,
          isOperational: false,
          timestamp: new Date().toISOString(),
        }),
    ...(cause && { cause }),
    ...(options.includeStack && err.stack ? { stack: err.stack } : {}),
  }
}
