export class AppError extends Error {
  public readonly code: string;
  public readonly statusCode: number;
  public readonly isOperational: boolean;
  public readonly details?: Record<string, unknown>;

  constructor(
    message: string,
    code: string,
    statusCode: number,
    isOperational: boolean = true,
    details?: Record<string, unknown>
  ) {
    super(message);
    this.code = code;
    this.statusCode = statusCode;
    this.isOperational = isOperational;
    this.details = details;
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }

  static notFound(resource: string, id: string): NotFoundError {
    return new NotFoundError(`${resource} with id '${id}' not found`, { resource, id });
  }

  static insufficientFunds(
    accountId: string,
    currency: string,
    required: string,
    available: string
  ): InsufficientFundsError {
    return new InsufficientFundsError(
      `Insufficient ${currency} balance: required ${required}, available ${available}`,
      { accountId, currency, required, available }
    );
  }
}

export class InvalidOperationError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'INVALID_OPERATION', 400, true, details);
  }
}

export class NotFoundError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'NOT_FOUND', 404, true, details);
  }
}

export class InsufficientFundsError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'INSUFFICIENT_FUNDS', 409, true, details);
  }
}

export class OfferNotActiveError extends AppError {
  constructor(offerId: string, status: string) {
    super(`Offer ${offerId} is ${status}, not active`, 'OFFER_NOT_ACTIVE', 409, true, {
      offerId,
      status,
    });
  }
}

export class TooEarlyError extends AppError {
  public readonly retryAfterMs: number;

  constructor(message: string, retryAfterMs: number, details?: Record<string, unknown>) {
    super(message, 'TOO_EARLY', 429, true, { ...details, retryAfterMs });
    this.retryAfterMs = retryAfterMs;
  }
}

export class PriceUnavailableError extends AppError {
  constructor(pair: string) {
    super(`No price available for ${pair}`, 'PRICE_UNAVAILABLE', 503, true, { pair });
  }
}

/**
 * Transient storage failure. Nothing was committed, so the caller may retry.
 */
export class StorageUnavailableError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'STORAGE_UNAVAILABLE', 503, true, details);
  }
}

/**
 * An internal consistency check failed. Indicates a bug; never retried or
 * corrected silently.
 */
export class InvariantViolationError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'INVARIANT_VIOLATION', 500, false, details);
  }
}

export interface ServiceError {
  code: string;
  message: string;
  details?: Record<string, unknown>;
}

export function toServiceError(error: unknown): ServiceError {
  if (error instanceof AppError) {
    return {
      code: error.code,
      message: error.message,
      ...(error.details ? { details: error.details } : {}),
    };
  }
  return {
    code: 'INTERNAL_ERROR',
    message: error instanceof Error ? error.message : 'Unknown error',
  };
}
