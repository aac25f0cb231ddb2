import { logger } from './logger';
import { RoundState, UpkeepSnapshot } from '../types/lottery';

// Error types
export enum ErrorType {
  VALIDATION_ERROR = 'VALIDATION_ERROR',
  CONFIGURATION_ERROR = 'CONFIGURATION_ERROR',
  INSUFFICIENT_PAYMENT = 'INSUFFICIENT_PAYMENT',
  INSUFFICIENT_FUNDS = 'INSUFFICIENT_FUNDS',
  ROUND_NOT_OPEN = 'ROUND_NOT_OPEN',
  UPKEEP_NOT_NEEDED = 'UPKEEP_NOT_NEEDED',
  PAYOUT_FAILED = 'PAYOUT_FAILED',
  ONLY_COORDINATOR_CAN_FULFILL = 'ONLY_COORDINATOR_CAN_FULFILL',
  INVALID_REQUEST = 'INVALID_REQUEST',
  INVALID_RANDOM_WORDS = 'INVALID_RANDOM_WORDS',
  PLAYER_INDEX_OUT_OF_RANGE = 'PLAYER_INDEX_OUT_OF_RANGE',
}

export type ErrorContext = Record<string, unknown>;

// Custom error classes
export class AppError extends Error {
  public readonly type: ErrorType;
  public readonly isOperational: boolean;
  public readonly context?: ErrorContext;

  constructor(
    message: string,
    type: ErrorType,
    isOperational: boolean = true,
    context?: ErrorContext
  ) {
    super(message);
    Object.setPrototypeOf(this, new.target.prototype);

    this.name = new.target.name;
    this.type = type;
    this.isOperational = isOperational;
    this.context = context;

    Error.captureStackTrace(this);
  }
}

export class ValidationError extends AppError {
  constructor(message: string, context?: ErrorContext) {
    super(message, ErrorType.VALIDATION_ERROR, true, context);
  }
}

export class ConfigurationError extends AppError {
  constructor(message: string, context?: ErrorContext) {
    super(message, ErrorType.CONFIGURATION_ERROR, false, context);
  }
}

export class InsufficientPaymentError extends AppError {
  constructor(public readonly sent: bigint, public readonly required: bigint) {
    super(`Entry payment ${sent} is below the entrance fee ${required}`, ErrorType.INSUFFICIENT_PAYMENT, true, {
      sent,
      required,
    });
  }
}

export class InsufficientFundsError extends AppError {
  constructor(public readonly account: string, public readonly balance: bigint, public readonly required: bigint) {
    super(`Account ${account} holds ${balance}, needs ${required}`, ErrorType.INSUFFICIENT_FUNDS, true, {
      account,
      balance,
      required,
    });
  }
}

export class RoundNotOpenError extends AppError {
  constructor(public readonly state: RoundState) {
    super(`Round is not open (state: ${RoundState[state]})`, ErrorType.ROUND_NOT_OPEN, true, { state });
  }
}

/**
 * Carries the state the eligibility check saw, so a keeper can tell why it
 * was refused.
 */
export class UpkeepNotNeededError extends AppError {
  constructor(public readonly snapshot: UpkeepSnapshot) {
    super(
      `Upkeep not needed (balance: ${snapshot.balance}, participants: ${snapshot.participantCount}, state: ${RoundState[snapshot.state]})`,
      ErrorType.UPKEEP_NOT_NEEDED,
      true,
      { ...snapshot }
    );
  }
}

/**
 * Raised after the round has already been reset. The pot stays in the
 * lottery account and needs manual recovery.
 */
export class PayoutFailedError extends AppError {
  constructor(public readonly winner: string, public readonly amount: bigint) {
    super(`Payout of ${amount} to ${winner} was rejected`, ErrorType.PAYOUT_FAILED, false, { winner, amount });
  }
}

export class OnlyCoordinatorCanFulfillError extends AppError {
  constructor(public readonly have: string, public readonly want: string) {
    super(`Only coordinator ${want} can fulfill, got ${have}`, ErrorType.ONLY_COORDINATOR_CAN_FULFILL, true, {
      have,
      want,
    });
  }
}

export class InvalidRequestError extends AppError {
  constructor(public readonly requestId: bigint) {
    super(`No outstanding randomness request ${requestId}`, ErrorType.INVALID_REQUEST, true, { requestId });
  }
}

export class InvalidRandomWordsError extends AppError {
  constructor(message: string, context?: ErrorContext) {
    super(message, ErrorType.INVALID_RANDOM_WORDS, true, context);
  }
}

export class PlayerIndexOutOfRangeError extends AppError {
  constructor(public readonly index: number, public readonly length: number) {
    super(`Player index ${index} out of range (${length} players)`, ErrorType.PLAYER_INDEX_OUT_OF_RANGE, true, {
      index,
      length,
    });
  }
}

export function isAppError(error: unknown): error is AppError {
  return error instanceof AppError;
}

export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

// Error handler functions
export function handleError(error: unknown, context?: ErrorContext): void {
  if (isAppError(error)) {
    if (error.isOperational) {
      logger.warn(`Operational error: ${error.message}`, {
        type: error.type,
        context: error.context || context,
      });
    } else {
      logger.error(`Critical error: ${error.message}`, {
        type: error.type,
        context: error.context || context,
        stack: error.stack,
      });
    }
  } else {
    const err = toError(error);
    logger.error(`Unexpected error: ${err.message}`, {
      context,
      stack: err.stack,
    });
  }
}

export function createValidationError(field: string, value: unknown, expected: string): ValidationError {
  return new ValidationError(`Invalid ${field}: expected ${expected}, got ${String(value)}`, {
    field,
    value,
    expected,
  });
}
