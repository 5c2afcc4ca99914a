/**
 * Category Poller Tests
 *
 * Loop behavior under fake timers:
 * - immediate poll on start, then one per interval
 * - ticks skipped while a poll is in flight
 * - timeouts, failure thresholds, recovery
 * - config_error on a rejected API key
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import type { PollerStatus } from '@marquee/shared';
import { CategoryPoller, type CategoryPollerOptions } from '../categoryPoller.js';
import { TransportError } from '../../../utils/errors.js';
import { createTestLogger } from '../../../test/fixtures.js';

const NOW = new Date('2026-01-01T00:00:00Z');

function createPoller(overrides: Partial<CategoryPollerOptions<number>> = {}) {
  const options = {
    category: 'sessions' as const,
    intervalMs: 1000,
    timeoutMs: 5000,
    poll: vi.fn(async () => 1),
    onSuccess: vi.fn(),
    onUnavailable: vi.fn(),
    onStatus: vi.fn(),
    logger: createTestLogger(),
    clock: () => NOW,
    ...overrides,
  };
  return { poller: new CategoryPoller<number>(options), options };
}

describe('CategoryPoller', () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  describe('scheduling', () => {
    it('should poll immediately and then on every interval', async () => {
      const { poller, options } = createPoller();

      poller.start();
      await vi.advanceTimersByTimeAsync(0);
      expect(options.poll).toHaveBeenCalledTimes(1);
      expect(options.onSuccess).toHaveBeenCalledWith(1);

      await vi.advanceTimersByTimeAsync(2000);
      expect(options.poll).toHaveBeenCalledTimes(3);
      expect(poller.isRunning).toBe(true);

      poller.stop();
    });

    it('should skip ticks while a poll is still running', async () => {
      const logger = createTestLogger();
      const poll = vi.fn(
        () => new Promise<number>((resolve) => setTimeout(() => resolve(1), 2500))
      );
      const { poller } = createPoller({ poll, logger });

      poller.start();
      await vi.advanceTimersByTimeAsync(2500);
      expect(poll).toHaveBeenCalledTimes(1);
      expect(logger.debug).toHaveBeenCalledTimes(2);

      await vi.advanceTimersByTimeAsync(500);
      expect(poll).toHaveBeenCalledTimes(2);

      poller.stop();
    });

    it('should not start twice', async () => {
      const { poller, options } = createPoller();

      poller.start();
      poller.start();
      await vi.advanceTimersByTimeAsync(0);

      expect(options.poll).toHaveBeenCalledTimes(1);
      poller.stop();
    });
  });

  describe('status', () => {
    it('should report ok after a successful poll', async () => {
      const { poller, options } = createPoller();

      await poller.runOnce();

      expect(poller.status).toEqual({
        category: 'sessions',
        status: 'ok',
        lastSuccessAt: '2026-01-01T00:00:00.000Z',
        lastErrorAt: null,
        lastError: null,
        consecutiveFailures: 0,
      });
      expect(options.onStatus).toHaveBeenCalledTimes(1);
    });

    it('should abandon a poll that outlives its timeout', async () => {
      const poll = vi.fn(() => new Promise<number>(() => undefined));
      const { poller, options } = createPoller({ poll, timeoutMs: 500 });

      const run = poller.runOnce();
      await vi.advanceTimersByTimeAsync(500);
      await run;

      expect(options.onSuccess).not.toHaveBeenCalled();
      expect(poller.status.status).toBe('degraded');
      expect(poller.status.lastError).toBe('Emby error: sessions poll exceeded 500ms');
      expect(poller.status.consecutiveFailures).toBe(1);
    });

    it('should hold the slot until an abandoned poll settles and discard its result', async () => {
      const logger = createTestLogger();
      const poll = vi
        .fn<() => Promise<number>>()
        .mockImplementationOnce(() => new Promise((resolve) => setTimeout(() => resolve(7), 800)))
        .mockImplementation(async () => 2);
      const { poller, options } = createPoller({ poll, logger, timeoutMs: 500 });

      const first = poller.runOnce();
      await vi.advanceTimersByTimeAsync(500);
      await first;
      expect(poller.status.status).toBe('degraded');

      await poller.runOnce();
      expect(poll).toHaveBeenCalledTimes(1);
      expect(logger.debug).toHaveBeenCalledWith('Previous poll still running, skipping tick');

      await vi.advanceTimersByTimeAsync(300);
      expect(options.onSuccess).not.toHaveBeenCalled();

      await poller.runOnce();
      expect(poll).toHaveBeenCalledTimes(2);
      expect(options.onSuccess).toHaveBeenCalledTimes(1);
      expect(options.onSuccess).toHaveBeenCalledWith(2);
      expect(poller.status.status).toBe('ok');
    });

    it('should mark entities unavailable once failures reach the threshold', async () => {
      const poll = vi.fn(async (): Promise<number> => {
        throw new TransportError('unreachable', 'connection refused');
      });
      const { poller, options } = createPoller({ poll });

      await poller.runOnce();
      await poller.runOnce();
      expect(options.onUnavailable).not.toHaveBeenCalled();

      await poller.runOnce();
      expect(options.onUnavailable).toHaveBeenCalledTimes(1);
      expect(poller.status.consecutiveFailures).toBe(3);
      expect(poller.status.status).toBe('degraded');
    });

    it('should emit a status for every failure', async () => {
      const statuses: PollerStatus[] = [];
      const poll = vi.fn(async (): Promise<number> => {
        throw new Error('boom');
      });
      const { poller } = createPoller({ poll, onStatus: (status) => statuses.push(status) });

      await poller.runOnce();
      await poller.runOnce();

      expect(statuses.map((s) => [s.status, s.consecutiveFailures])).toEqual([
        ['degraded', 1],
        ['degraded', 2],
      ]);
    });

    it('should recover after a success', async () => {
      const logger = createTestLogger();
      const poll = vi
        .fn<() => Promise<number>>()
        .mockRejectedValueOnce(new Error('boom'))
        .mockResolvedValueOnce(7);
      const { poller, options } = createPoller({ poll, logger });

      await poller.runOnce();
      await poller.runOnce();

      expect(poller.status.status).toBe('ok');
      expect(poller.status.consecutiveFailures).toBe(0);
      expect(poller.status.lastError).toBe('boom');
      expect(options.onSuccess).toHaveBeenCalledWith(7);
      expect(logger.info).toHaveBeenCalledWith('Poll recovered');
    });

    it('should count a publish failure as a poll failure', async () => {
      const onSuccess = vi.fn(() => {
        throw new Error('publish failed');
      });
      const { poller } = createPoller({ onSuccess });

      await expect(poller.runOnce()).resolves.toBeUndefined();
      expect(poller.status.lastError).toBe('publish failed');
    });
  });

  describe('rejected API key', () => {
    it('should stop with config_error and go unavailable at once', async () => {
      const poll = vi.fn(async (): Promise<number> => {
        throw new TransportError('unauthorized', 'API key rejected');
      });
      const { poller, options } = createPoller({ poll });

      poller.start();
      await vi.advanceTimersByTimeAsync(0);

      expect(options.onUnavailable).toHaveBeenCalledTimes(1);
      expect(poller.status.status).toBe('config_error');
      expect(poller.isRunning).toBe(false);

      await vi.advanceTimersByTimeAsync(5000);
      expect(poll).toHaveBeenCalledTimes(1);
    });

    it('should return to idle when restarted', async () => {
      const poll = vi
        .fn<() => Promise<number>>()
        .mockRejectedValueOnce(new TransportError('unauthorized', 'API key rejected'))
        .mockResolvedValue(1);
      const statuses: string[] = [];
      const { poller } = createPoller({ poll, onStatus: (status) => statuses.push(status.status) });

      poller.start();
      await vi.advanceTimersByTimeAsync(0);
      poller.start();
      await vi.advanceTimersByTimeAsync(0);

      expect(statuses).toEqual(['config_error', 'idle', 'ok']);
      poller.stop();
    });
  });

  describe('stop', () => {
    it('should discard a poll that finishes after stop', async () => {
      const poll = vi.fn(
        () => new Promise<number>((resolve) => setTimeout(() => resolve(1), 1000))
      );
      const { poller, options } = createPoller({ poll, intervalMs: 10_000 });

      poller.start();
      await vi.advanceTimersByTimeAsync(500);
      poller.stop();
      await vi.advanceTimersByTimeAsync(1000);

      expect(options.onSuccess).not.toHaveBeenCalled();
      expect(poller.status.status).toBe('stopped');
      expect(poller.isRunning).toBe(false);
    });
  });
});
