/**
 * Base application error.
 */
export class AppError extends Error {
  constructor(
    public readonly statusCode: number,
    public readonly code: string,
    message: string,
    public readonly details?: unknown
  ) {
    super(message);
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }

  toJSON() {
    return {
      error: true,
      statusCode: this.statusCode,
      code: this.code,
      message: this.message,
      details: this.details
    };
  }
}

/**
 * Validation error (400).
 */
export class ValidationError extends AppError {
  constructor(message: string, details?: unknown) {
    super(400, 'VALIDATION_ERROR', message, details);
  }
}

/**
 * Not found error (404).
 */
export class NotFoundError extends AppError {
  constructor(resource: string, id?: string) {
    const message = id ? `${resource} with id '${id}' not found` : `${resource} not found`;
    super(404, 'NOT_FOUND', message);
  }
}

/**
 * Business rule violation error (422).
 */
export class BusinessRuleError extends AppError {
  constructor(message: string, details?: unknown) {
    super(422, 'BUSINESS_RULE_ERROR', message, details);
  }
}

/**
 * Configuration error (500). Raised while loading configuration, which
 * aborts startup.
 */
export class ConfigError extends AppError {
  constructor(message: string) {
    super(500, 'CONFIG_ERROR', message);
  }
}

/**
 * Persistent store failure (503). The whole turn may be retried.
 */
export class StorageError extends AppError {
  readonly retryable = true;

  constructor(message: string, cause?: unknown) {
    super(503, 'STORAGE_ERROR', message, cause instanceof Error ? { cause: cause.message } : undefined);
  }
}

/**
 * Oracle output did not have the expected shape (502).
 * Recorded as the reason of a parse fallback.
 */
export class OracleParseError extends AppError {
  constructor(message: string, public readonly raw?: string) {
    super(502, 'ORACLE_PARSE_ERROR', message);
  }
}

/**
 * Outbound channel delivery failure (502).
 */
export class ChannelDeliveryError extends AppError {
  constructor(message: string, details?: unknown) {
    super(502, 'CHANNEL_DELIVERY_ERROR', message, details);
  }
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}

export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
