import { EventEmitter } from 'events';
import { Clock, DrawRequestedEvent, systemClock } from '../types/lottery';
import type { RandomWordsFulfilledEvent } from './randomness-coordinator';
import { createComponentLogger } from '../utils/logger';

const log = createComponentLogger('vrf-monitor');

export interface DrawAlert {
  type: 'stuck_draw' | 'fulfillment_failed';
  message: string;
  requestId: bigint;
  outstandingSeconds?: number;
}

export interface DrawMetrics {
  totalRequests: number;
  fulfilledRequests: number;
  failedRequests: number;
  averageResponseSeconds: number;
  successRate: number;
}

/**
 * Watches draw requests and their fulfillment. Nothing here touches the
 * round; a request that never comes back only produces alerts.
 */
export class DrawMonitor extends EventEmitter {
  private metrics: DrawMetrics = DrawMonitor.emptyMetrics();
  private outstanding = new Map<bigint, number>();
  private alerted = new Set<bigint>();

  constructor(
    private readonly stuckThresholdSeconds: number = 3600,
    private readonly clock: Clock = systemClock
  ) {
    super();
  }

  /**
   * Subscribe to the engine's and coordinator's notifications.
   */
  attach(engine: EventEmitter, coordinator: EventEmitter): void {
    engine.on('drawRequested', (event: DrawRequestedEvent) => this.trackRequest(event.requestId));
    coordinator.on('randomWordsFulfilled', (event: RandomWordsFulfilledEvent) =>
      this.trackFulfillment(event.requestId, event.success)
    );
  }

  trackRequest(requestId: bigint): void {
    this.metrics.totalRequests++;
    this.outstanding.set(requestId, this.clock.now());
    log.debug('Draw request tracked', { requestId, totalRequests: this.metrics.totalRequests });
  }

  trackFulfillment(requestId: bigint, success: boolean): void {
    const requestedAt = this.outstanding.get(requestId);
    if (requestedAt === undefined) {
      log.warn('Fulfillment for untracked request', { requestId });
      return;
    }
    this.outstanding.delete(requestId);
    this.alerted.delete(requestId);

    if (success) {
      this.metrics.fulfilledRequests++;
    } else {
      this.metrics.failedRequests++;
      this.emitAlert({
        type: 'fulfillment_failed',
        message: `Fulfillment of request ${requestId} failed`,
        requestId,
      });
    }

    const responseSeconds = this.clock.now() - requestedAt;
    const totalResponses = this.metrics.fulfilledRequests + this.metrics.failedRequests;
    this.metrics.averageResponseSeconds =
      (this.metrics.averageResponseSeconds * (totalResponses - 1) + responseSeconds) / totalResponses;
    this.metrics.successRate = this.metrics.fulfilledRequests / this.metrics.totalRequests;

    log.info('Draw fulfillment tracked', {
      requestId,
      success,
      responseSeconds,
      successRate: this.metrics.successRate,
    });
  }

  /**
   * Alert once per request that has waited past the threshold.
   */
  checkStuckDraws(): DrawAlert[] {
    const now = this.clock.now();
    const alerts: DrawAlert[] = [];

    for (const [requestId, requestedAt] of this.outstanding) {
      const outstandingSeconds = now - requestedAt;
      if (outstandingSeconds < this.stuckThresholdSeconds || this.alerted.has(requestId)) {
        continue;
      }
      this.alerted.add(requestId);
      const alert: DrawAlert = {
        type: 'stuck_draw',
        message: `Request ${requestId} outstanding for ${outstandingSeconds}s; round is locked in DRAWING`,
        requestId,
        outstandingSeconds,
      };
      this.emitAlert(alert);
      alerts.push(alert);
    }

    return alerts;
  }

  getOutstandingRequests(): bigint[] {
    return [...this.outstanding.keys()];
  }

  getMetrics(): DrawMetrics {
    return { ...this.metrics };
  }

  resetMetrics(): void {
    this.metrics = DrawMonitor.emptyMetrics();
    log.info('Draw metrics reset');
  }

  private emitAlert(alert: DrawAlert): void {
    this.emit('alert', alert);
    log.warn('Draw alert', { ...alert });
  }

  private static emptyMetrics(): DrawMetrics {
    return {
      totalRequests: 0,
      fulfilledRequests: 0,
      failedRequests: 0,
      averageResponseSeconds: 0,
      successRate: 0,
    };
  }
}
