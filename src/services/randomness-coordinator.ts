import { EventEmitter } from 'events';
import { randomBytes } from 'crypto';
import {
  Clock,
  RandomnessConsumer,
  RandomnessOracle,
  RandomWordsRequest,
  systemClock,
} from '../types/lottery';
import { VRF } from '../utils/vrf';
import { normalizeAddress } from '../utils/address';
import { createComponentLogger } from '../utils/logger';
import {
  InvalidRandomWordsError,
  InvalidRequestError,
  ValidationError,
  handleError,
  toError,
} from '../utils/error-handler';

const log = createComponentLogger('randomness-coordinator');

export interface PendingRequest {
  requestId: bigint;
  consumer: string;
  request: RandomWordsRequest;
  requestedAt: number;
}

export interface RandomWordsRequestedEvent {
  requestId: bigint;
  consumer: string;
  keyHash: string;
  subId: bigint;
  numWords: number;
}

export interface RandomWordsFulfilledEvent {
  requestId: bigint;
  consumer: string;
  success: boolean;
  proofs: string[];
  error?: Error;
}

export interface CoordinatorOptions {
  address: string;
  clock?: Clock;
  /** Fulfil each request automatically after this delay. Off when undefined. */
  autoFulfillDelayMs?: number;
  /** Mixed into every derived seed. Random per instance when omitted. */
  preSeed?: string;
}

/**
 * In-process randomness oracle. Requests are numbered from 1 and consumed
 * exactly once; a consumer callback that throws still consumes its request.
 *
 * Emits `randomWordsRequested`, `randomWordsFulfilled` and, for timer-driven
 * fulfillment only, `fulfillmentError`.
 */
export class LocalRandomnessCoordinator extends EventEmitter implements RandomnessOracle {
  private readonly address: string;
  private readonly clock: Clock;
  private readonly autoFulfillDelayMs?: number;
  private readonly preSeed: string;

  private consumers = new Map<string, RandomnessConsumer>();
  private pending = new Map<bigint, PendingRequest>();
  private timers = new Map<bigint, NodeJS.Timeout>();
  private nextRequestId = 1n;

  constructor(options: CoordinatorOptions) {
    super();
    this.address = normalizeAddress(options.address, 'address');
    this.clock = options.clock ?? systemClock;
    this.autoFulfillDelayMs = options.autoFulfillDelayMs;
    this.preSeed = options.preSeed ?? randomBytes(32).toString('hex');
  }

  getAddress(): string {
    return this.address;
  }

  registerConsumer(address: string, consumer: RandomnessConsumer): void {
    const consumerAddress = normalizeAddress(address, 'consumer');
    this.consumers.set(consumerAddress, consumer);
    log.info('Consumer registered', { consumer: consumerAddress });
  }

  requestRandomWords(request: RandomWordsRequest, consumer: string): bigint {
    const consumerAddress = normalizeAddress(consumer, 'consumer');

    if (!this.consumers.has(consumerAddress)) {
      throw new ValidationError(`Consumer ${consumerAddress} is not registered`, { consumer: consumerAddress });
    }
    if (request.requestConfirmations < 1) {
      throw new ValidationError('requestConfirmations must be at least 1', {
        requestConfirmations: request.requestConfirmations,
      });
    }
    if (request.numWords < 1) {
      throw new ValidationError('numWords must be at least 1', { numWords: request.numWords });
    }
    if (request.callbackGasLimit <= 0) {
      throw new ValidationError('callbackGasLimit must be positive', {
        callbackGasLimit: request.callbackGasLimit,
      });
    }

    const requestId = this.nextRequestId++;
    this.pending.set(requestId, {
      requestId,
      consumer: consumerAddress,
      request: { ...request, extraArgs: { ...request.extraArgs } },
      requestedAt: this.clock.now(),
    });

    const event: RandomWordsRequestedEvent = {
      requestId,
      consumer: consumerAddress,
      keyHash: request.keyHash,
      subId: request.subId,
      numWords: request.numWords,
    };
    this.emit('randomWordsRequested', event);
    log.info('Randomness requested', { requestId, consumer: consumerAddress });

    if (this.autoFulfillDelayMs !== undefined) {
      this.scheduleFulfillment(requestId, this.autoFulfillDelayMs);
    }

    return requestId;
  }

  /**
   * Fulfil with words derived from the VRF utility.
   */
  fulfillRandomWords(requestId: bigint): void {
    const pending = this.requirePending(requestId);
    const seed = `${this.preSeed}:${pending.request.keyHash}:${requestId}`;
    const { words, proofs } = VRF.toRandomWords(seed, pending.request.numWords);
    this.deliver(pending, words, proofs);
  }

  /**
   * Fulfil with caller-chosen words; length must match the request and
   * every word must fit in a uint256.
   */
  fulfillRandomWordsWithOverride(requestId: bigint, words: readonly bigint[]): void {
    const pending = this.requirePending(requestId);
    if (words.length !== pending.request.numWords) {
      throw new InvalidRandomWordsError(
        `Expected ${pending.request.numWords} random words, got ${words.length}`,
        { requestId, expected: pending.request.numWords, received: words.length }
      );
    }
    const invalid = words.findIndex((word) => !VRF.isRandomWord(word));
    if (invalid !== -1) {
      throw new InvalidRandomWordsError(`Random word ${invalid} is outside the uint256 range`, {
        requestId,
        index: invalid,
        word: words[invalid],
      });
    }
    this.deliver(pending, [...words], []);
  }

  getPendingRequest(requestId: bigint): PendingRequest | undefined {
    return this.pending.get(requestId);
  }

  pendingCount(): number {
    return this.pending.size;
  }

  stop(): void {
    for (const timer of this.timers.values()) {
      clearTimeout(timer);
    }
    this.timers.clear();
  }

  private requirePending(requestId: bigint): PendingRequest {
    const pending = this.pending.get(requestId);
    if (!pending) {
      throw new InvalidRequestError(requestId);
    }
    return pending;
  }

  private deliver(pending: PendingRequest, words: bigint[], proofs: string[]): void {
    const { requestId, consumer } = pending;

    // Consumed before the callback runs, so it can never be delivered twice.
    this.pending.delete(requestId);
    const timer = this.timers.get(requestId);
    if (timer) {
      clearTimeout(timer);
      this.timers.delete(requestId);
    }

    const target = this.consumers.get(consumer);
    if (!target) {
      throw new InvalidRequestError(requestId);
    }

    try {
      target.rawFulfillRandomWords(this.address, requestId, words);
    } catch (error) {
      const err = toError(error);
      const failed: RandomWordsFulfilledEvent = { requestId, consumer, success: false, proofs, error: err };
      this.emit('randomWordsFulfilled', failed);
      handleError(err, { requestId, consumer });
      throw err;
    }

    const event: RandomWordsFulfilledEvent = { requestId, consumer, success: true, proofs };
    this.emit('randomWordsFulfilled', event);
    log.info('Randomness fulfilled', { requestId, consumer });
  }

  private scheduleFulfillment(requestId: bigint, delayMs: number): void {
    const timer = setTimeout(() => {
      this.timers.delete(requestId);
      try {
        this.fulfillRandomWords(requestId);
      } catch (error) {
        // Already logged in deliver(); surface it to whoever is listening.
        this.emit('fulfillmentError', { requestId, error: toError(error) });
      }
    }, delayMs);
    this.timers.set(requestId, timer);
  }
}
