/**
 * Congestion Controller
 *
 * Slow start, congestion avoidance and fast retransmit / fast recovery in
 * the classic Reno style. The controller owns the congestion window, the
 * slow-start threshold and the duplicate-ACK counter; nothing else mutates
 * them.
 *
 * Phase transitions:
 *   SlowStart --(cwnd >= ssthresh)--> CongestionAvoidance
 *   SlowStart | CongestionAvoidance --(3rd duplicate ACK)--> FastRecovery
 *   FastRecovery --(new ACK)--> CongestionAvoidance
 *   any --(timeout)--> SlowStart
 *
 * @module engine/congestion/controller
 */

import { TypedEventEmitter } from '../events.js';
import { CongestionPhase } from '../types.js';

// =============================================================================
// Types
// =============================================================================

/**
 * Options for creating a congestion controller. Sizes in bytes.
 */
export interface CongestionControllerOptions {
  mss: number;
  initialWindow: number;
  initialThreshold: number;

  /** Duplicate ACKs that trigger a fast retransmit (default: 3) */
  duplicateAckThreshold?: number;
}

/**
 * What the sender must do in response to a duplicate ACK.
 */
export type DuplicateAckAction =
  /** Nothing yet; below the threshold */
  | 'none'
  /** Threshold reached: retransmit the oldest unacknowledged segment now */
  | 'fast-retransmit'
  /** Already recovering: the window was inflated, new data may be sent */
  | 'inflate';

/**
 * Cause of a window change.
 */
export type WindowChangeReason = 'ack' | 'fast-retransmit' | 'inflate' | 'recovery-exit' | 'timeout';

/**
 * Events emitted by the CongestionController.
 */
export interface CongestionControllerEvents {
  /** Emitted whenever the window, threshold or phase changes */
  window: {
    reason: WindowChangeReason;
    phase: CongestionPhase;
    window: number;
    threshold: number;
  };
}

/** Default duplicate-ACK threshold */
const DEFAULT_DUPLICATE_ACK_THRESHOLD = 3;

// =============================================================================
// CongestionController Class
// =============================================================================

/**
 * Reno-style congestion controller.
 *
 * @example
 * ```typescript
 * const cc = new CongestionController({ mss: 500, initialWindow: 500, initialThreshold: 65535 });
 *
 * cc.onNewAck();                       // cwnd 500 -> 1000
 * if (cc.onDuplicateAck() === 'fast-retransmit') {
 *   // resend the oldest unacknowledged segment
 * }
 * cc.onTimeout();                      // cwnd back to one segment
 * ```
 */
export class CongestionController extends TypedEventEmitter<CongestionControllerEvents> {
  private readonly mss: number;
  private readonly duplicateAckThreshold: number;

  private cwnd: number;
  private ssthresh: number;
  private duplicates = 0;
  private phase_: CongestionPhase = CongestionPhase.SlowStart;

  constructor(options: CongestionControllerOptions) {
    super();
    this.mss = options.mss;
    this.duplicateAckThreshold = options.duplicateAckThreshold ?? DEFAULT_DUPLICATE_ACK_THRESHOLD;
    this.cwnd = options.initialWindow;
    this.ssthresh = options.initialThreshold;
    if (this.cwnd >= this.ssthresh) {
      this.phase_ = CongestionPhase.CongestionAvoidance;
    }
  }

  // ===========================================================================
  // Getters
  // ===========================================================================

  /** Congestion window in bytes */
  get window(): number {
    return this.cwnd;
  }

  /** Slow-start threshold in bytes */
  get threshold(): number {
    return this.ssthresh;
  }

  get phase(): CongestionPhase {
    return this.phase_;
  }

  /** Consecutive duplicate ACKs seen for the current window edge */
  get duplicateAcks(): number {
    return this.duplicates;
  }

  // ===========================================================================
  // Event Handlers
  // ===========================================================================

  /**
   * A cumulative ACK advanced the send window edge.
   */
  onNewAck(): void {
    this.duplicates = 0;

    if (this.phase_ === CongestionPhase.FastRecovery) {
      // Deflate to the threshold set when recovery began
      this.cwnd = this.ssthresh;
      this.phase_ = CongestionPhase.CongestionAvoidance;
      this.notify('recovery-exit');
      return;
    }

    if (this.phase_ === CongestionPhase.SlowStart) {
      this.cwnd += this.mss;
      if (this.cwnd >= this.ssthresh) {
        this.phase_ = CongestionPhase.CongestionAvoidance;
      }
    } else {
      this.cwnd += Math.max(1, Math.floor((this.mss * this.mss) / this.cwnd));
    }

    this.notify('ack');
  }

  /**
   * An ACK repeated the current window edge while data was outstanding.
   */
  onDuplicateAck(): DuplicateAckAction {
    this.duplicates++;

    if (this.phase_ === CongestionPhase.FastRecovery) {
      this.cwnd += this.mss;
      this.notify('inflate');
      return 'inflate';
    }

    if (this.duplicates === this.duplicateAckThreshold) {
      this.ssthresh = this.halvedWindow();
      this.cwnd = this.ssthresh + this.duplicateAckThreshold * this.mss;
      this.phase_ = CongestionPhase.FastRecovery;
      this.notify('fast-retransmit');
      return 'fast-retransmit';
    }

    return 'none';
  }

  /**
   * The retransmission timer expired.
   */
  onTimeout(): void {
    this.ssthresh = this.halvedWindow();
    this.cwnd = this.mss;
    this.duplicates = 0;
    this.phase_ = CongestionPhase.SlowStart;
    this.notify('timeout');
  }

  // ===========================================================================
  // Private Methods
  // ===========================================================================

  /**
   * Half the current window, never below two segments.
   */
  private halvedWindow(): number {
    return Math.max(Math.floor(this.cwnd / 2), 2 * this.mss);
  }

  private notify(reason: WindowChangeReason): void {
    this.emit('window', {
      reason,
      phase: this.phase_,
      window: this.cwnd,
      threshold: this.ssthresh,
    });
  }
}
