/**
 * Error hierarchy for the paper-trading ledger.
 * Every error carries a stable `code` so HTTP handlers and logs can branch on it.
 */

export type TradingErrorCode =
  | 'INSUFFICIENT_MARGIN'
  | 'LEVERAGE_OUT_OF_BOUNDS'
  | 'DUPLICATE_OPEN_POSITION'
  | 'INVALID_ORDER'
  | 'POSITION_ALREADY_CLOSED'
  | 'POSITION_NOT_FOUND'
  | 'RUN_NOT_FOUND'
  | 'CONCURRENT_MUTATION'
  | 'CONFIGURATION'
  | 'TRANSIENT_DATA'
  | 'INVALID_STATE';

export class TradingError extends Error {
  readonly code: TradingErrorCode;
  readonly status: number;

  constructor(code: TradingErrorCode, message: string, status = 400) {
    super(message);
    this.name = new.target.name;
    this.code = code;
    this.status = status;
  }
}

export class InsufficientMarginError extends TradingError {
  constructor(message: string) {
    super('INSUFFICIENT_MARGIN', message);
  }
}

export class LeverageOutOfBoundsError extends TradingError {
  constructor(message: string) {
    super('LEVERAGE_OUT_OF_BOUNDS', message);
  }
}

export class DuplicateOpenPositionError extends TradingError {
  constructor(accountName: string, symbol: string) {
    super('DUPLICATE_OPEN_POSITION', `Account ${accountName} already has an open ${symbol} position`, 409);
  }
}

export class InvalidOrderError extends TradingError {
  constructor(message: string) {
    super('INVALID_ORDER', message);
  }
}

export class PositionAlreadyClosedError extends TradingError {
  constructor(positionId: string) {
    super('POSITION_ALREADY_CLOSED', `Position ${positionId} is already closed`, 409);
  }
}

export class PositionNotFoundError extends TradingError {
  constructor(positionId: string) {
    super('POSITION_NOT_FOUND', `Position ${positionId} not found`, 404);
  }
}

export class RunNotFoundError extends TradingError {
  constructor(runId: string) {
    super('RUN_NOT_FOUND', `Run ${runId} not found`, 404);
  }
}

export class ConcurrentMutationError extends TradingError {
  constructor() {
    super('CONCURRENT_MUTATION', 'Another ledger transaction is in progress', 409);
  }
}

export class InvalidStateError extends TradingError {
  constructor(message: string) {
    super('INVALID_STATE', message, 409);
  }
}

/**
 * Raised once with every violation found, never one at a time.
 */
export class ConfigurationError extends TradingError {
  readonly violations: string[];

  constructor(scope: string, violations: string[]) {
    super('CONFIGURATION', `Invalid ${scope} configuration: ${violations.join('; ')}`);
    this.violations = violations;
  }
}

export class TransientDataError extends TradingError {
  readonly retryable: boolean;

  constructor(message: string, retryable = true) {
    super('TRANSIENT_DATA', message, 503);
    this.retryable = retryable;
  }
}

export function isTradingError(error: unknown): error is TradingError {
  return error instanceof TradingError;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
