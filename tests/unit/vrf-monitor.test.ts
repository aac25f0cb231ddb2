import { describe, it, expect, beforeEach, jest } from '@jest/globals';
import { DrawAlert, DrawMonitor } from '../../src/services/vrf-monitor';
import { PayoutFailedError } from '../../src/utils/error-handler';
import { ENTRANCE_FEE, FakeClock, LotteryFixture, PLAYER_1, createFixture } from '../utils/test-helpers';

describe('DrawMonitor', () => {
  let clock: FakeClock;
  let monitor: DrawMonitor;

  beforeEach(() => {
    clock = new FakeClock();
    monitor = new DrawMonitor(600, clock);
  });

  it('should alert once for a request outstanding past the threshold', () => {
    const listener = jest.fn<(alert: DrawAlert) => void>();
    monitor.on('alert', listener);
    monitor.trackRequest(1n);

    clock.advance(599);
    expect(monitor.checkStuckDraws()).toEqual([]);

    clock.advance(1);
    const alerts = monitor.checkStuckDraws();
    expect(alerts).toHaveLength(1);
    expect(alerts[0].type).toBe('stuck_draw');
    expect(alerts[0].outstandingSeconds).toBe(600);
    expect(listener).toHaveBeenCalledTimes(1);

    clock.advance(60);
    expect(monitor.checkStuckDraws()).toEqual([]);
  });

  it('should compute response time and success rate', () => {
    monitor.trackRequest(1n);
    clock.advance(10);
    monitor.trackFulfillment(1n, true);

    monitor.trackRequest(2n);
    clock.advance(20);
    monitor.trackFulfillment(2n, true);

    expect(monitor.getMetrics()).toEqual({
      totalRequests: 2,
      fulfilledRequests: 2,
      failedRequests: 0,
      averageResponseSeconds: 15,
      successRate: 1,
    });
    expect(monitor.getOutstandingRequests()).toEqual([]);
  });

  it('should ignore fulfillments it never saw requested', () => {
    monitor.trackFulfillment(5n, true);

    expect(monitor.getMetrics().fulfilledRequests).toBe(0);
  });

  it('should reset metrics', () => {
    monitor.trackRequest(1n);
    monitor.resetMetrics();

    expect(monitor.getMetrics().totalRequests).toBe(0);
  });

  describe('Attached to a lottery', () => {
    let fixture: LotteryFixture;

    beforeEach(() => {
      fixture = createFixture();
      monitor = new DrawMonitor(600, fixture.clock);
      monitor.attach(fixture.engine, fixture.coordinator);
      fixture.ledger.credit(PLAYER_1, ENTRANCE_FEE);
      fixture.engine.enter({ from: PLAYER_1, value: ENTRANCE_FEE });
      fixture.clock.advance(30);
    });

    it('should follow a draw from request to fulfillment', () => {
      const requestId = fixture.engine.triggerDraw();
      expect(monitor.getOutstandingRequests()).toEqual([requestId]);

      fixture.clock.advance(5);
      fixture.coordinator.fulfillRandomWords(requestId);

      expect(monitor.getMetrics()).toEqual({
        totalRequests: 1,
        fulfilledRequests: 1,
        failedRequests: 0,
        averageResponseSeconds: 5,
        successRate: 1,
      });
    });

    it('should raise an alert when the payout fails', () => {
      const listener = jest.fn<(alert: DrawAlert) => void>();
      monitor.on('alert', listener);
      const requestId = fixture.engine.triggerDraw();
      fixture.ledger.setRejectsFunds(PLAYER_1, true);

      expect(() => fixture.coordinator.fulfillRandomWords(requestId)).toThrow(PayoutFailedError);

      expect(monitor.getMetrics().failedRequests).toBe(1);
      expect(listener).toHaveBeenCalledWith({
        type: 'fulfillment_failed',
        message: `Fulfillment of request ${requestId} failed`,
        requestId,
      });
    });
  });
});
