import { UpkeepCheck } from '../types/lottery';
import { createComponentLogger } from '../utils/logger';
import { UpkeepNotNeededError, handleError } from '../utils/error-handler';

const log = createComponentLogger('upkeep-keeper');

export interface Upkeepable {
  checkUpkeep(): UpkeepCheck;
  performUpkeep(performData: string): bigint;
}

export interface KeeperStats {
  checks: number;
  performed: number;
  skipped: number;
  failures: number;
  lastRequestId?: bigint;
}

/**
 * Automation agent: polls the eligibility check and triggers the draw when
 * it passes. Retrying is simply the next tick.
 */
export class UpkeepKeeper {
  private interval?: NodeJS.Timeout;
  private stats: KeeperStats = { checks: 0, performed: 0, skipped: 0, failures: 0 };

  constructor(
    private readonly target: Upkeepable,
    private readonly pollIntervalMs: number = 5000
  ) {}

  start(): void {
    if (this.interval) {
      return;
    }
    this.interval = setInterval(() => this.tick(), this.pollIntervalMs);
    log.info(`Keeper polling every ${this.pollIntervalMs}ms`);
  }

  stop(): void {
    if (this.interval) {
      clearInterval(this.interval);
      this.interval = undefined;
      log.info('Keeper stopped');
    }
  }

  isRunning(): boolean {
    return this.interval !== undefined;
  }

  /**
   * One poll. Returns the request id when a draw was triggered.
   */
  tick(): bigint | undefined {
    this.stats.checks++;

    let check: UpkeepCheck;
    try {
      check = this.target.checkUpkeep();
    } catch (error) {
      this.stats.failures++;
      handleError(error, { operation: 'checkUpkeep' });
      return undefined;
    }

    if (!check.upkeepNeeded) {
      return undefined;
    }

    try {
      const requestId = this.target.performUpkeep(check.performData);
      this.stats.performed++;
      this.stats.lastRequestId = requestId;
      log.info('Upkeep performed', { requestId });
      return requestId;
    } catch (error) {
      if (error instanceof UpkeepNotNeededError) {
        // Lost a race with another caller; try again next tick.
        this.stats.skipped++;
        log.debug('Upkeep no longer needed', { snapshot: error.snapshot });
        return undefined;
      }
      this.stats.failures++;
      handleError(error, { operation: 'performUpkeep' });
      return undefined;
    }
  }

  getStats(): KeeperStats {
    return { ...this.stats };
  }
}
