import { describe, it, expect, afterEach, jest } from '@jest/globals';
import {
  AppError,
  ConfigurationError,
  ErrorType,
  InsufficientPaymentError,
  PayoutFailedError,
  RoundNotOpenError,
  UpkeepNotNeededError,
  createValidationError,
  handleError,
  isAppError,
} from '../src/utils/error-handler';
import { logger } from '../src/utils/logger';
import { RoundState } from '../src/types/lottery';
import { PLAYER_1 } from './utils/test-helpers';

describe('Error handling', () => {
  afterEach(() => {
    jest.restoreAllMocks();
  });

  describe('Error classes', () => {
    it('should keep the subclass identity', () => {
      const error = new InsufficientPaymentError(1n, 10n);

      expect(error).toBeInstanceOf(InsufficientPaymentError);
      expect(error).toBeInstanceOf(AppError);
      expect(error).toBeInstanceOf(Error);
      expect(error.name).toBe('InsufficientPaymentError');
      expect(error.type).toBe(ErrorType.INSUFFICIENT_PAYMENT);
      expect(error.message).toBe('Entry payment 1 is below the entrance fee 10');
    });

    it('should describe the refused upkeep snapshot', () => {
      const error = new UpkeepNotNeededError({ balance: 0n, participantCount: 0, state: RoundState.OPEN });

      expect(error.message).toBe('Upkeep not needed (balance: 0, participants: 0, state: OPEN)');
      expect(error.context).toEqual({ balance: 0n, participantCount: 0, state: RoundState.OPEN });
    });

    it('should name the round state', () => {
      expect(new RoundNotOpenError(RoundState.DRAWING).message).toBe('Round is not open (state: DRAWING)');
    });

    it('should mark payout failures as non-operational', () => {
      const error = new PayoutFailedError(PLAYER_1, 5n);

      expect(error.isOperational).toBe(false);
      expect(error.type).toBe(ErrorType.PAYOUT_FAILED);
    });

    it('should build validation errors with their context', () => {
      const error = createValidationError('from', 'bob', 'a 20-byte hex address');

      expect(error.message).toBe('Invalid from: expected a 20-byte hex address, got bob');
      expect(error.context).toEqual({ field: 'from', value: 'bob', expected: 'a 20-byte hex address' });
    });

    it('should recognise application errors', () => {
      expect(isAppError(new ConfigurationError('bad'))).toBe(true);
      expect(isAppError(new Error('plain'))).toBe(false);
    });
  });

  describe('handleError', () => {
    it('should log operational errors as warnings', () => {
      const warn = jest.spyOn(logger, 'warn');
      const error = jest.spyOn(logger, 'error');

      handleError(new RoundNotOpenError(RoundState.DRAWING));

      expect(warn).toHaveBeenCalledTimes(1);
      expect(error).not.toHaveBeenCalled();
    });

    it('should log critical errors as errors', () => {
      const warn = jest.spyOn(logger, 'warn');
      const error = jest.spyOn(logger, 'error');

      handleError(new PayoutFailedError(PLAYER_1, 5n));

      expect(error).toHaveBeenCalledTimes(1);
      expect(warn).not.toHaveBeenCalled();
    });

    it('should log unknown throwables as errors', () => {
      const error = jest.spyOn(logger, 'error');

      handleError('string failure', { operation: 'test' });

      expect(error).toHaveBeenCalledWith(
        'Unexpected error: string failure',
        expect.objectContaining({ context: { operation: 'test' } })
      );
    });
  });
});
