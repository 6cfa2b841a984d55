import { BaseError } from "@relaycache/errors"

export class ConfigValidationError extends BaseError<"invalid_config"> {
  constructor(message: string, issues: readonly string[], cause?: unknown) {
    super(message, {
      code: "invalid_config",
      context: { issues: [...issues] },
      cause,
    })
  }
}
