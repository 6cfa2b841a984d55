import type { AppError } from "../../ports/error"

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null
}

/**
 * Structural check for {@link AppError}.
 *
 * @remarks
 * Errors can cross package boundaries (a connection adapter rejects, the
 * storage client classifies), so this does not rely on `instanceof`.
 */
export function isAppError(e: unknown): e is AppError {
  if (!(e instanceof Error) || !isRecord(e)) return false

  const { code, context, isRetryable, isOperational, timestamp } = e

  return (
    typeof code === "string" &&
    isRecord(context) &&
    typeof isRetryable === "boolean" &&
    typeof isOperational === "boolean" &&
    timestamp instanceof Date &&
    Number.isFinite(timestamp.valueOf())
  )
}
