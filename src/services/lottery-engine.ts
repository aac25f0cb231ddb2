import { EventEmitter } from 'events';
import { ZeroAddress, formatEther } from 'ethers';
import {
  Clock,
  DrawConfig,
  DrawRequestedEvent,
  EnteredEvent,
  EntryPayment,
  LotteryRound,
  RandomnessConsumer,
  RandomnessOracle,
  RandomWordsRequest,
  RoundState,
  UpkeepCheck,
  UpkeepSnapshot,
  WinnerPickedEvent,
  systemClock,
} from '../types/lottery';
import { validateDrawConfig } from '../config/draw-config';
import { NativeLedger } from '../blockchain/native-ledger';
import { normalizeAddress } from '../utils/address';
import { VRF } from '../utils/vrf';
import { createComponentLogger } from '../utils/logger';
import {
  InsufficientFundsError,
  InsufficientPaymentError,
  InvalidRandomWordsError,
  OnlyCoordinatorCanFulfillError,
  PayoutFailedError,
  PlayerIndexOutOfRangeError,
  RoundNotOpenError,
  UpkeepNotNeededError,
} from '../utils/error-handler';

const log = createComponentLogger('lottery-engine');

export interface LotteryEngineOptions {
  /** Account on the ledger that holds the pot. */
  address: string;
  config: DrawConfig;
  oracle: RandomnessOracle;
  ledger: NativeLedger;
  clock?: Clock;
}

/**
 * Recurring single-pot lottery. Every method runs to completion
 * synchronously; the only gap is between triggerDraw and the oracle's
 * fulfillment callback, during which the round sits in DRAWING.
 *
 * Emits `entered`, `drawRequested` and `winnerPicked`.
 */
export class LotteryEngine extends EventEmitter implements RandomnessConsumer {
  private readonly address: string;
  private readonly config: Readonly<DrawConfig>;
  private readonly oracle: RandomnessOracle;
  private readonly ledger: NativeLedger;
  private readonly clock: Clock;
  private readonly round: LotteryRound;

  constructor(options: LotteryEngineOptions) {
    super();

    this.address = normalizeAddress(options.address, 'address');
    this.config = validateDrawConfig(options.config);
    this.oracle = options.oracle;
    this.ledger = options.ledger;
    this.clock = options.clock ?? systemClock;

    this.round = {
      state: RoundState.OPEN,
      participants: [],
      lastDrawTimestamp: this.clock.now(),
      recentWinner: ZeroAddress,
    };

    log.info('Lottery engine deployed', {
      address: this.address,
      entranceFee: formatEther(this.config.entranceFee),
      intervalSeconds: this.config.intervalSeconds,
    });
  }

  /**
   * Join the current round. Anything paid above the fee stays in the pot.
   */
  enter(payment: EntryPayment): void {
    if (payment.value < this.config.entranceFee) {
      throw new InsufficientPaymentError(payment.value, this.config.entranceFee);
    }
    if (this.round.state !== RoundState.OPEN) {
      throw new RoundNotOpenError(this.round.state);
    }

    const player = normalizeAddress(payment.from, 'from');
    if (!this.ledger.transfer(player, this.address, payment.value)) {
      throw new InsufficientFundsError(player, this.ledger.balanceOf(player), payment.value);
    }

    this.round.participants.push(player);

    const event: EnteredEvent = { player, value: payment.value };
    this.emit('entered', event);
    log.info('Player entered', { player, value: formatEther(payment.value) });
  }

  checkUpkeep(): UpkeepCheck {
    return { upkeepNeeded: this.isEligibleForDraw(), performData: '0x' };
  }

  /**
   * Read-only. Recomputed on every call since time and balance move
   * underneath us.
   */
  isEligibleForDraw(): boolean {
    const timePassed = this.clock.now() - this.round.lastDrawTimestamp >= this.config.intervalSeconds;
    const isOpen = this.round.state === RoundState.OPEN;
    const hasBalance = this.getBalance() > 0n;
    const hasPlayers = this.round.participants.length > 0;

    return timePassed && isOpen && hasBalance && hasPlayers;
  }

  /**
   * Close entry and ask the oracle for randomness. Callable by anyone;
   * eligibility is the only gate. Returns the oracle's request id.
   */
  triggerDraw(): bigint {
    if (!this.isEligibleForDraw()) {
      throw new UpkeepNotNeededError(this.snapshot());
    }

    // Close the round before the external call so a second trigger fails.
    this.round.state = RoundState.DRAWING;

    const request: RandomWordsRequest = {
      keyHash: this.config.keyHash,
      subId: this.config.subscriptionId,
      requestConfirmations: this.config.requestConfirmations,
      callbackGasLimit: this.config.callbackGasLimit,
      numWords: this.config.numWords,
      extraArgs: { nativePayment: this.config.nativePayment },
    };

    let requestId: bigint;
    try {
      requestId = this.oracle.requestRandomWords(request, this.address);
    } catch (error) {
      // The whole call aborts, so the round goes back to accepting entries.
      this.round.state = RoundState.OPEN;
      throw error;
    }

    const event: DrawRequestedEvent = { requestId, timestamp: this.clock.now() };
    this.emit('drawRequested', event);
    log.info('Draw requested', { requestId, participants: this.round.participants.length });

    return requestId;
  }

  performUpkeep(_performData: string = '0x'): bigint {
    return this.triggerDraw();
  }

  /**
   * Privileged entry point for the randomness coordinator.
   */
  rawFulfillRandomWords(caller: string, requestId: bigint, randomWords: readonly bigint[]): void {
    const coordinator = this.config.coordinatorAddress;
    let have: string;
    try {
      have = normalizeAddress(caller, 'caller');
    } catch {
      throw new OnlyCoordinatorCanFulfillError(caller, coordinator);
    }
    if (have !== coordinator) {
      throw new OnlyCoordinatorCanFulfillError(have, coordinator);
    }
    if (randomWords.length === 0) {
      throw new InvalidRandomWordsError('Expected at least one random word, got none', { requestId });
    }
    const invalid = randomWords.findIndex((word) => !VRF.isRandomWord(word));
    if (invalid !== -1) {
      throw new InvalidRandomWordsError(`Random word ${invalid} is outside the uint256 range`, {
        requestId,
        index: invalid,
        word: randomWords[invalid],
      });
    }

    this.fulfillDraw(requestId, randomWords);
  }

  /**
   * Pick the winner, reset the round, then pay out. A refused payout throws
   * PayoutFailedError with the round already reset and the pot still held.
   */
  private fulfillDraw(requestId: bigint, randomWords: readonly bigint[]): void {
    const participants = this.round.participants;
    // With no participants this is a division by zero (RangeError).
    // triggerDraw never lets that happen.
    const winnerIndex = Number(randomWords[0] % BigInt(participants.length));
    const winner = participants[winnerIndex];

    this.round.recentWinner = winner;
    this.round.state = RoundState.OPEN;
    this.round.participants = [];
    this.round.lastDrawTimestamp = this.clock.now();

    const amount = this.getBalance();
    const event: WinnerPickedEvent = {
      winner,
      requestId,
      amount,
      timestamp: this.round.lastDrawTimestamp,
    };
    this.emit('winnerPicked', event);

    if (!this.ledger.transfer(this.address, winner, amount)) {
      log.error('Payout failed; pot stranded in lottery account', {
        requestId,
        winner,
        amount: formatEther(amount),
      });
      throw new PayoutFailedError(winner, amount);
    }

    log.info('Winner paid', { requestId, winner, winnerIndex, amount: formatEther(amount) });
  }

  // Read accessors

  getAddress(): string {
    return this.address;
  }

  getEntranceFee(): bigint {
    return this.config.entranceFee;
  }

  getInterval(): number {
    return this.config.intervalSeconds;
  }

  getPlayer(index: number): string {
    const participants = this.round.participants;
    if (!Number.isInteger(index) || index < 0 || index >= participants.length) {
      throw new PlayerIndexOutOfRangeError(index, participants.length);
    }
    return participants[index];
  }

  getNumberOfPlayers(): number {
    return this.round.participants.length;
  }

  getRecentWinner(): string {
    return this.round.recentWinner;
  }

  getLastTimeStamp(): number {
    return this.round.lastDrawTimestamp;
  }

  getRaffleState(): RoundState {
    return this.round.state;
  }

  getBalance(): bigint {
    return this.ledger.balanceOf(this.address);
  }

  getNumWords(): number {
    return this.config.numWords;
  }

  getRequestConfirmations(): number {
    return this.config.requestConfirmations;
  }

  getSubscriptionId(): bigint {
    return this.config.subscriptionId;
  }

  private snapshot(): UpkeepSnapshot {
    return {
      balance: this.getBalance(),
      participantCount: this.round.participants.length,
      state: this.round.state,
    };
  }
}
