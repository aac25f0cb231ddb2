import { formatEther } from 'ethers';
import { AppConfig } from './config';
import { Clock, EnteredEvent, WinnerPickedEvent, systemClock } from './types/lottery';
import { NativeLedger } from './blockchain/native-ledger';
import { LotteryEngine } from './services/lottery-engine';
import { LocalRandomnessCoordinator } from './services/randomness-coordinator';
import { UpkeepKeeper } from './services/upkeep-keeper';
import { DrawAlert, DrawMonitor } from './services/vrf-monitor';
import { logger } from './utils/logger';

export interface LotteryService {
  ledger: NativeLedger;
  coordinator: LocalRandomnessCoordinator;
  engine: LotteryEngine;
  keeper: UpkeepKeeper;
  monitor: DrawMonitor;
  start(): void;
  stop(): void;
}

/**
 * Wire ledger, coordinator, engine, keeper and monitor together.
 */
export function createLotteryService(config: AppConfig, clock: Clock = systemClock): LotteryService {
  const ledger = new NativeLedger();
  const coordinator = new LocalRandomnessCoordinator({
    address: config.lottery.draw.coordinatorAddress,
    clock,
    autoFulfillDelayMs: config.oracle.fulfillDelayMs,
  });
  const engine = new LotteryEngine({
    address: config.lottery.address,
    config: config.lottery.draw,
    oracle: coordinator,
    ledger,
    clock,
  });
  coordinator.registerConsumer(engine.getAddress(), engine);

  const keeper = new UpkeepKeeper(engine, config.keeper.pollIntervalMs);
  const monitor = new DrawMonitor(config.monitoring.stuckDrawSeconds, clock);
  monitor.attach(engine, coordinator);

  engine.on('entered', (event: EnteredEvent) => {
    logger.info(`🎟️ ${event.player} entered with ${formatEther(event.value)} ETH`);
  });
  engine.on('winnerPicked', (event: WinnerPickedEvent) => {
    logger.info(`🏆 Winner ${event.winner} takes ${formatEther(event.amount)} ETH`, { requestId: event.requestId });
  });
  monitor.on('alert', (alert: DrawAlert) => {
    logger.warn(`🚨 ${alert.message}`);
  });

  let stuckCheck: NodeJS.Timeout | undefined;

  return {
    ledger,
    coordinator,
    engine,
    keeper,
    monitor,
    start() {
      keeper.start();
      stuckCheck = setInterval(() => monitor.checkStuckDraws(), config.keeper.pollIntervalMs);
    },
    stop() {
      keeper.stop();
      coordinator.stop();
      if (stuckCheck) {
        clearInterval(stuckCheck);
        stuckCheck = undefined;
      }
    },
  };
}
