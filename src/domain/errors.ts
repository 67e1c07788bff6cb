export type ErrorCategory = 'validation' | 'capacity' | 'state' | 'completeness';

export type ValidationErrorCode = 'InvalidEntry' | 'InvalidParameter' | 'InvalidStopAboveEntry';
export type CapacityErrorCode = 'MaxPositionsReached' | 'DuplicateTicker' | 'InsufficientCash' | 'ZeroShareResult';
export type StateErrorCode =
  | 'PositionNotFound'
  | 'PositionAlreadyClosed'
  | 'PositionNotOpen'
  | 'StopCannotDecrease'
  | 'SnapshotAlreadyExists';
export type CompletenessErrorCode = 'MissingPrice';

export type TradingErrorCode = ValidationErrorCode | CapacityErrorCode | StateErrorCode | CompletenessErrorCode;

/**
 * Base class for every rejection raised by the trading core.
 * `category` tells the caller whether to fix input, skip the candidate,
 * or treat the call as an ordering bug.
 */
export abstract class TradingError extends Error {
  abstract readonly category: ErrorCategory;
  readonly code: TradingErrorCode;
  readonly details: Record<string, unknown>;

  protected constructor(code: TradingErrorCode, message: string, details: Record<string, unknown> = {}) {
    super(message);
    this.name = code;
    this.code = code;
    this.details = details;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/** Bad input. Never partially applied. */
export class InputValidationError extends TradingError {
  readonly category = 'validation' as const;

  constructor(code: ValidationErrorCode, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
  }
}

/** Expected "skip this candidate" outcomes. */
export class CapacityError extends TradingError {
  readonly category = 'capacity' as const;

  constructor(code: CapacityErrorCode, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
  }
}

export class StateError extends TradingError {
  readonly category = 'state' as const;

  constructor(code: StateErrorCode, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
  }
}

export class CompletenessError extends TradingError {
  readonly category = 'completeness' as const;

  constructor(code: CompletenessErrorCode, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
  }
}

export function isTradingError(error: unknown, code?: TradingErrorCode): error is TradingError {
  if (!(error instanceof TradingError)) {
    return false;
  }

  return code === undefined || error.code === code;
}
