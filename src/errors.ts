export const ErrorCodes = {
  SOURCE_UNAVAILABLE: "SOURCE_UNAVAILABLE",
  DELIVERY_FAILED: "DELIVERY_FAILED",
  PERSISTENCE_FAILED: "PERSISTENCE_FAILED",
  CONFIG_INVALID: "CONFIG_INVALID",
  TIMEOUT: "TIMEOUT",
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

export class AppError extends Error {
  public readonly code: ErrorCode;
  public readonly details?: unknown;

  constructor(code: ErrorCode, message: string, details?: unknown) {
    super(message);
    this.name = new.target.name;
    this.code = code;
    this.details = details;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class SourceUnavailableError extends AppError {
  constructor(
    public readonly coinId: string,
    public readonly currency: string,
    message: string,
    details?: unknown,
  ) {
    super(ErrorCodes.SOURCE_UNAVAILABLE, message, details);
  }
}

export class DeliveryFailedError extends AppError {
  constructor(
    public readonly chatId: number,
    message: string,
    /** Telegram will never accept messages for this chat again. */
    public readonly chatGone = false,
    details?: unknown,
  ) {
    super(ErrorCodes.DELIVERY_FAILED, message, details);
  }
}

export class PersistenceFailedError extends AppError {
  constructor(message: string, details?: unknown) {
    super(ErrorCodes.PERSISTENCE_FAILED, message, details);
  }
}

export class ConfigInvalidError extends AppError {
  constructor(
    public readonly entity: "subscription" | "alert",
    public readonly rowId: unknown,
    message: string,
    details?: unknown,
  ) {
    super(ErrorCodes.CONFIG_INVALID, message, details);
  }
}

export class TimeoutError extends AppError {
  constructor(public readonly timeoutMs: number, label: string) {
    super(ErrorCodes.TIMEOUT, `${label} timed out after ${timeoutMs}ms`);
  }
}

export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
