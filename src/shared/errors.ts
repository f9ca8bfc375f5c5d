/**
 * Base application error. All domain-specific errors extend this class.
 *
 * - `code`          short machine-readable identifier (e.g. "BET_PRICE_HIGHER")
 * - `statusCode`    HTTP-compatible status code for API responses
 * - `isOperational` true = expected/recoverable, false = programmer error
 */
export class AppError extends Error {
  public readonly code: string;
  public readonly statusCode: number;
  public readonly isOperational: boolean;
  public readonly timestamp: string;

  constructor(
    message: string,
    code: string,
    statusCode = 500,
    isOperational = true,
  ) {
    super(message);
    this.name = this.constructor.name;
    this.code = code;
    this.statusCode = statusCode;
    this.isOperational = isOperational;
    this.timestamp = new Date().toISOString();

    // Maintains proper prototype chain for instanceof checks
    Object.setPrototypeOf(this, new.target.prototype);
    Error.captureStackTrace(this, this.constructor);
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      statusCode: this.statusCode,
      isOperational: this.isOperational,
      timestamp: this.timestamp,
      ...(process.env['NODE_ENV'] !== 'production' ? { stack: this.stack } : {}),
    };
  }
}

/** Bad spreadsheet path, extension or layout. The run never starts. */
export class InvalidInputError extends AppError {
  public readonly path: string;

  constructor(message: string, path: string) {
    super(message, 'INVALID_INPUT', 422);
    this.path = path;
  }

  override toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      path: this.path,
    };
  }
}

export class AuthenticationFailedError extends AppError {
  public readonly attempts: number;

  constructor(message: string, attempts = 1) {
    super(message, 'AUTHENTICATION_FAILED', 401);
    this.attempts = attempts;
  }

  override toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      attempts: this.attempts,
    };
  }
}

/**
 * Raised internally by the authenticator when a session fails the liveness
 * probe. Only this code is retried; it never leaves the authenticator.
 */
export class SessionNotLiveError extends AppError {
  constructor(url: string) {
    super(`Session is not authenticated for ${url}`, 'SESSION_NOT_LIVE', 401);
  }
}

export class SessionExpiredError extends AppError {
  constructor(message = 'Login expired') {
    super(message, 'SESSION_EXPIRED', 401);
  }
}

/**
 * Base for failures of the betting-page protocol. `step` names the protocol
 * step (load, fill, submit, price, confirm) that produced it.
 */
export class ProtocolError extends AppError {
  public readonly step: string;

  constructor(message: string, code: string, step: string, statusCode = 502) {
    super(message, code, statusCode);
    this.step = step;
  }

  override toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      step: this.step,
    };
  }
}

export class GameLoadFailedError extends ProtocolError {
  constructor(message: string) {
    super(message, 'GAME_LOAD_FAILED', 'load');
  }
}

export class CombinationFailedError extends ProtocolError {
  constructor(message: string) {
    super(message, 'COMBINATION_FAILED', 'submit');
  }
}

export class BetPriceHigherError extends ProtocolError {
  public readonly price: number;
  public readonly ceiling: number;

  constructor(price: number, ceiling: number) {
    super(
      `Bet price is higher than ${ceiling} | ${price}`,
      'BET_PRICE_HIGHER',
      'price',
      409,
    );
    this.price = price;
    this.ceiling = ceiling;
  }

  override toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      price: this.price,
      ceiling: this.ceiling,
    };
  }
}

export class BetConfirmationFailedError extends ProtocolError {
  constructor(message: string) {
    super(message, 'BET_CONFIRMATION_FAILED', 'confirm');
  }
}

/**
 * An element the protocol relies on is missing from the page. The remote
 * markup has changed and the parser needs review; never treat as transient.
 */
export class UnknownPageStructureError extends ProtocolError {
  constructor(message: string, step: string) {
    super(message, 'UNKNOWN_PAGE_STRUCTURE', step, 500);
  }
}

export class ValidationError extends AppError {
  public readonly field: string;
  public readonly value: unknown;

  constructor(
    message: string,
    field: string,
    value?: unknown,
    statusCode = 422,
  ) {
    super(message, 'VALIDATION_ERROR', statusCode);
    this.field = field;
    this.value = value;
  }

  override toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      field: this.field,
      value: this.value,
    };
  }
}

/** A run-manager request that conflicts with the current run state. */
export class RunConflictError extends AppError {
  constructor(message: string) {
    super(message, 'RUN_CONFLICT', 409);
  }
}

/** Human-readable message of any thrown value, keeping the original text. */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
