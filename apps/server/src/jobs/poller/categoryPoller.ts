/**
 * Category Poller
 *
 * One independent polling loop per data category. Each loop:
 * - runs at most one poll at a time (a tick during a running poll is skipped)
 * - abandons a poll that outlives its timeout, keeping the previous state;
 *   the abandoned poll still holds the slot until it settles
 * - stops itself on a rejected API key (config_error)
 * - marks its entities unavailable after repeated failures
 *
 * A failing category never affects another.
 */

import { POLL_LIMITS } from '@marquee/shared';
import type { PollCategory, PollerStatus, PollStatus } from '@marquee/shared';
import { TransportError, isTransportError } from '../../utils/errors.js';
import { errorMessage, type Logger } from '../../utils/logger.js';

export interface CategoryPollerOptions<T> {
  category: PollCategory;
  intervalMs: number;
  timeoutMs?: number;
  failuresBeforeUnavailable?: number;
  /** Fetch and shape this category's data */
  poll: () => Promise<T>;
  /** Publish a successful result */
  onSuccess: (result: T) => void;
  /** Flag this category's entities unavailable */
  onUnavailable: () => void;
  onStatus?: (status: PollerStatus) => void;
  logger: Logger;
  clock?: () => Date;
}

export class CategoryPoller<T> {
  readonly category: PollCategory;
  private readonly intervalMs: number;
  private readonly timeoutMs: number;
  private readonly failuresBeforeUnavailable: number;
  private readonly clock: () => Date;

  private timer: NodeJS.Timeout | null = null;
  // Settles with the running poll, abandoned or not
  private inFlight: Promise<void> | null = null;
  // Bumped on stop so a poll that outlives its loop is discarded
  private generation = 0;

  private state: PollerStatus;

  constructor(private readonly options: CategoryPollerOptions<T>) {
    this.category = options.category;
    this.intervalMs = options.intervalMs;
    this.timeoutMs = options.timeoutMs ?? POLL_LIMITS.TIMEOUT_MS;
    this.failuresBeforeUnavailable =
      options.failuresBeforeUnavailable ?? POLL_LIMITS.FAILURES_BEFORE_UNAVAILABLE;
    this.clock = options.clock ?? (() => new Date());
    this.state = {
      category: options.category,
      status: 'idle',
      lastSuccessAt: null,
      lastErrorAt: null,
      lastError: null,
      consecutiveFailures: 0,
    };
  }

  get status(): PollerStatus {
    return { ...this.state };
  }

  get isRunning(): boolean {
    return this.timer !== null;
  }

  /**
   * Start the loop: poll now, then every interval
   */
  start(): void {
    if (this.timer) return;

    this.options.logger.info({ intervalMs: this.intervalMs }, 'Starting poller');
    if (this.state.status === 'stopped' || this.state.status === 'config_error') {
      this.setStatus('idle');
    }
    this.timer = setInterval(() => void this.runOnce(), this.intervalMs);
    void this.runOnce();
  }

  stop(status: Extract<PollStatus, 'stopped' | 'config_error'> = 'stopped'): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
      this.options.logger.info('Poller stopped');
    }
    this.generation++;
    this.inFlight = null;
    this.setStatus(status);
  }

  /**
   * Run one poll unless one is already in flight. Never rejects.
   */
  async runOnce(): Promise<void> {
    if (this.inFlight) {
      this.options.logger.debug('Previous poll still running, skipping tick');
      return;
    }

    const generation = this.generation;
    const running = Promise.resolve().then(() => this.options.poll());
    let finished = false;
    const settled = running.then(
      () => {
        finished = true;
      },
      () => {
        finished = true;
      }
    );
    this.inFlight = settled;

    try {
      const result = await this.withTimeout(running);
      if (generation !== this.generation) return;
      this.options.onSuccess(result);
      this.recordSuccess();
    } catch (error) {
      if (generation !== this.generation) return;
      this.recordFailure(error);
    } finally {
      if (finished) {
        this.release(settled);
      } else {
        void settled.then(() => this.release(settled));
      }
    }
  }

  private release(poll: Promise<void>): void {
    if (this.inFlight === poll) this.inFlight = null;
  }

  private async withTimeout(running: Promise<T>): Promise<T> {
    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        reject(
          new TransportError('timeout', `${this.category} poll exceeded ${this.timeoutMs}ms`)
        );
      }, this.timeoutMs);
    });

    try {
      return await Promise.race([running, timeout]);
    } finally {
      clearTimeout(timer);
    }
  }

  private recordSuccess(): void {
    const recovered = this.state.consecutiveFailures > 0;
    this.state.consecutiveFailures = 0;
    this.state.lastSuccessAt = this.clock().toISOString();
    if (recovered) this.options.logger.info('Poll recovered');
    this.setStatus('ok', recovered);
  }

  private recordFailure(error: unknown): void {
    const message = errorMessage(error);
    this.state.consecutiveFailures++;
    this.state.lastErrorAt = this.clock().toISOString();
    this.state.lastError = message;

    if (isTransportError(error) && error.isFatal) {
      this.options.logger.error({ error: message }, 'API key rejected, polling stopped until reconfigured');
      this.options.onUnavailable();
      this.stop('config_error');
      return;
    }

    this.options.logger.warn(
      {
        error: message,
        kind: isTransportError(error) ? error.kind : 'internal',
        consecutiveFailures: this.state.consecutiveFailures,
      },
      'Poll failed'
    );

    if (this.state.consecutiveFailures >= this.failuresBeforeUnavailable) {
      this.options.onUnavailable();
    }
    this.setStatus('degraded', true);
  }

  private setStatus(status: PollStatus, force = false): void {
    if (this.state.status === status && !force) return;
    this.state.status = status;
    this.options.onStatus?.(this.status);
  }
}
