/**
 * Retransmission Timer Manager
 *
 * One logical retransmission timer per connection, bound to the oldest
 * unacknowledged segment. The timer lives as an entry in the connection's
 * {@link TimerQueue}; its duration comes from an {@link RttEstimator} and is
 * doubled on every expiry until a fresh round-trip sample arrives.
 *
 * @module engine/timer/retransmission
 */

import { TimerQueue } from './queue.js';
import { RttEstimator, type RttParameters } from './rtt.js';

/**
 * Timers owned by a single connection.
 */
export type ConnectionTimer = 'retransmit' | 'time-wait' | 'send-retry';

/**
 * Options for the retransmission timer.
 */
export interface RetransmissionTimerOptions {
  initialTimeout: number;
  minTimeout: number;
  maxTimeout: number;
}

/**
 * Adaptive retransmission timer.
 *
 * @example
 * ```typescript
 * const timers = new TimerQueue<ConnectionTimer>();
 * const rtx = new RetransmissionTimer(timers, { initialTimeout: 1000, minTimeout: 200, maxTimeout: 60000 });
 *
 * rtx.arm(now);            // first segment in flight
 * rtx.sample(40);          // ACK with a clean RTT sample
 * rtx.restart(now);        // window edge advanced
 * rtx.disarm();            // everything acknowledged
 * ```
 */
export class RetransmissionTimer {
  private readonly timers: TimerQueue<ConnectionTimer>;
  private readonly estimator: RttEstimator;

  /** Consecutive expiries without an intervening fresh sample */
  private backoffs = 0;

  constructor(timers: TimerQueue<ConnectionTimer>, options: RetransmissionTimerOptions) {
    this.timers = timers;
    const params: Partial<RttParameters> = {
      initialTimeout: options.initialTimeout,
      minTimeout: options.minTimeout,
      maxTimeout: options.maxTimeout,
    };
    this.estimator = new RttEstimator(params);
  }

  // ===========================================================================
  // Getters
  // ===========================================================================

  /** Current timeout in ms */
  get timeout(): number {
    return this.estimator.rto;
  }

  get smoothedRtt(): number | undefined {
    return this.estimator.smoothedRtt;
  }

  get rttVariance(): number | undefined {
    return this.estimator.rttVariance;
  }

  get armed(): boolean {
    return this.timers.isArmed('retransmit');
  }

  get deadline(): number | undefined {
    return this.timers.deadline('retransmit');
  }

  /** Consecutive backoffs since the last fresh sample */
  get backoffCount(): number {
    return this.backoffs;
  }

  // ===========================================================================
  // Control
  // ===========================================================================

  /**
   * Arm the timer if it is not already running.
   */
  arm(now: number): void {
    if (!this.armed) {
      this.timers.schedule('retransmit', now + this.timeout);
    }
  }

  /**
   * (Re)start the timer from `now`.
   */
  restart(now: number): void {
    this.timers.schedule('retransmit', now + this.timeout);
  }

  /**
   * Stop the timer.
   */
  disarm(): void {
    this.timers.cancel('retransmit');
  }

  /**
   * Feed a round-trip measurement. Pass `undefined` when the covered segment
   * was retransmitted (Karn's rule): the sample is discarded.
   */
  sample(rtt: number | undefined): void {
    if (rtt === undefined) {
      return;
    }
    this.estimator.push(rtt);
    this.backoffs = 0;
  }

  /**
   * Handle an expiry: double the timeout (capped) and re-arm.
   *
   * @returns The backed-off timeout now in effect
   */
  expire(now: number): number {
    const timeout = this.estimator.backoff();
    this.backoffs++;
    this.timers.schedule('retransmit', now + timeout);
    return timeout;
  }
}
