export enum RoundState {
  OPEN = 0,
  DRAWING = 1,
}

export interface DrawConfig {
  entranceFee: bigint;
  intervalSeconds: number;
  coordinatorAddress: string;
  keyHash: string;
  subscriptionId: bigint;
  callbackGasLimit: number;
  requestConfirmations: number;
  numWords: number;
  nativePayment: boolean;
}

export interface LotteryRound {
  state: RoundState;
  participants: string[];
  lastDrawTimestamp: number;
  recentWinner: string;
}

export interface RandomWordsRequest {
  keyHash: string;
  subId: bigint;
  requestConfirmations: number;
  callbackGasLimit: number;
  numWords: number;
  extraArgs: {
    nativePayment: boolean;
  };
}

export interface UpkeepCheck {
  upkeepNeeded: boolean;
  performData: string;
}

export interface UpkeepSnapshot {
  balance: bigint;
  participantCount: number;
  state: RoundState;
}

export interface EntryPayment {
  from: string;
  value: bigint;
}

/**
 * Seconds-resolution time source. The engine never reads the wall clock
 * directly so tests can move time forward.
 */
export interface Clock {
  now(): number;
}

export const systemClock: Clock = {
  now: () => Math.floor(Date.now() / 1000),
};

// Notification payloads
export interface EnteredEvent {
  player: string;
  value: bigint;
}

export interface DrawRequestedEvent {
  requestId: bigint;
  timestamp: number;
}

export interface WinnerPickedEvent {
  winner: string;
  requestId: bigint;
  amount: bigint;
  timestamp: number;
}

/**
 * Receiving side of a randomness request. Only the oracle integration layer
 * should hold a reference typed this way.
 */
export interface RandomnessConsumer {
  rawFulfillRandomWords(caller: string, requestId: bigint, randomWords: readonly bigint[]): void;
}

export interface RandomnessOracle {
  requestRandomWords(request: RandomWordsRequest, consumer: string): bigint;
}
