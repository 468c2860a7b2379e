/**
 * Receive Buffer & Reordering
 *
 * Accepts segments in any order, stores out-of-order data keyed by its
 * starting sequence number and hands the application a contiguous byte
 * stream. The advertised window is the free space of the buffer: what the
 * application has not yet read counts against it, out-of-order bytes do not
 * (they already lie inside the window).
 *
 * @module engine/receive/buffer
 */

import { seqAdd, seqDiff } from '../segment/sequence.js';

interface PendingSegment {
  seq: number;
  data: Buffer;
}

/**
 * Options for creating a receive buffer.
 */
export interface ReceiveBufferOptions {
  /** Sequence number of the first expected data byte (IRS + 1) */
  initialSequence: number;

  /** Buffer capacity, and the largest window advertised */
  maxWindow: number;
}

/**
 * Outcome of offering one segment to the buffer.
 */
export interface ReceiveResult {
  /** Cumulative acknowledgment number to send back */
  ack: number;

  /** Window to advertise in that acknowledgment */
  window: number;

  /** Bytes that became readable by this segment */
  delivered: number;

  /** Every byte (and the FIN) had been received before */
  duplicate: boolean;

  /** The segment started at or beyond the right window edge and was dropped */
  outOfWindow: boolean;

  /** The peer's FIN was consumed by this segment */
  finReceived: boolean;
}

/**
 * Reordering receive buffer.
 *
 * @example
 * ```typescript
 * const buffer = new ReceiveBuffer({ initialSequence: 1, maxWindow: 65535 });
 *
 * buffer.onSegment(11, Buffer.alloc(10), false);   // stored, ack stays 1
 * buffer.onSegment(1, Buffer.alloc(10), false);    // both delivered, ack 21
 *
 * for (const chunk of buffer.read()) {
 *   consume(chunk);
 * }
 * ```
 */
export class ReceiveBuffer {
  private readonly maxWindow: number;

  /** Next in-order sequence number expected */
  private next: number;

  /** Out-of-order data ordered by distance from `next` */
  private pending: PendingSegment[] = [];

  /** Readable chunks, oldest first */
  private ready: Buffer[] = [];
  private unread = 0;

  /** Sequence number of the peer's FIN once seen */
  private finSeq: number | undefined;
  private finConsumed = false;

  constructor(options: ReceiveBufferOptions) {
    this.next = options.initialSequence;
    this.maxWindow = options.maxWindow;
  }

  // ===========================================================================
  // Getters
  // ===========================================================================

  /** Next in-order sequence number expected (the cumulative ACK) */
  get receiveNext(): number {
    return this.next;
  }

  /** Free space advertised to the peer */
  get window(): number {
    return Math.max(0, this.maxWindow - this.unread);
  }

  /** Bytes delivered in order and not yet read */
  get readableBytes(): number {
    return this.unread;
  }

  /** Out-of-order bytes waiting for a gap to fill */
  get pendingBytes(): number {
    let total = 0;
    for (const { data } of this.pending) {
      total += data.length;
    }
    return total;
  }

  /** Whether the peer's FIN has been consumed */
  get finished(): boolean {
    return this.finConsumed;
  }

  // ===========================================================================
  // Network Side
  // ===========================================================================

  /**
   * Offer a segment's payload (and FIN flag) to the buffer.
   */
  onSegment(seq: number, payload: Buffer, fin: boolean): ReceiveResult {
    const window = this.window;
    let offset = seqDiff(seq, this.next);
    const end = offset + payload.length;
    let data = payload;
    let delivered = 0;
    let duplicate = false;
    let outOfWindow = false;
    let keepFin = fin;

    if (data.length > 0) {
      if (end <= 0) {
        duplicate = true;
      } else if (offset >= window) {
        outOfWindow = true;
        keepFin = false;
      } else {
        if (offset < 0) {
          data = data.subarray(-offset);
          offset = 0;
        }
        if (offset + data.length > window) {
          data = data.subarray(0, window - offset);
          keepFin = false;
        }

        if (offset === 0) {
          delivered += this.deliver(data);
          delivered += this.drainPending();
        } else {
          duplicate = !this.store(seqAdd(this.next, offset), offset, data);
        }
      }
    }

    let finReceived = false;
    if (keepFin) {
      const finOffset = end;
      if (this.finConsumed || finOffset < 0) {
        duplicate = payload.length === 0 || duplicate;
      } else if (finOffset <= window) {
        this.finSeq = seqAdd(seq, payload.length);
      }
    }
    if (this.finSeq !== undefined && !this.finConsumed && this.finSeq === this.next) {
      this.next = seqAdd(this.next, 1);
      this.finConsumed = true;
      finReceived = true;
    }

    return {
      ack: this.next,
      window: this.window,
      delivered,
      duplicate,
      outOfWindow,
      finReceived,
    };
  }

  // ===========================================================================
  // Application Side
  // ===========================================================================

  /**
   * Yield readable chunks in order. Each chunk is removed from the buffer as
   * it is yielded; stopping early leaves the rest in place.
   */
  *read(): Generator<Buffer, void, undefined> {
    while (this.ready.length > 0) {
      const chunk = this.ready.shift();
      if (chunk === undefined) {
        return;
      }
      this.unread -= chunk.length;
      yield chunk;
    }
  }

  /**
   * Release everything (connection reset).
   */
  clear(): void {
    this.pending = [];
    this.ready = [];
    this.unread = 0;
  }

  /**
   * Drop out-of-order data only; readable bytes stay available.
   */
  discardPending(): void {
    this.pending = [];
  }

  // ===========================================================================
  // Private Methods
  // ===========================================================================

  private deliver(data: Buffer): number {
    if (data.length === 0) {
      return 0;
    }
    this.ready.push(Buffer.from(data));
    this.unread += data.length;
    this.next = seqAdd(this.next, data.length);
    return data.length;
  }

  /**
   * Keep an out-of-order segment, or return false when the same start is
   * already held with at least as many bytes.
   */
  private store(seq: number, offset: number, data: Buffer): boolean {
    let low = 0;
    let high = this.pending.length;
    while (low < high) {
      const mid = (low + high) >>> 1;
      if (seqDiff(this.pending[mid].seq, this.next) < offset) {
        low = mid + 1;
      } else {
        high = mid;
      }
    }

    const existing = this.pending[low];
    if (existing && existing.seq === seq) {
      if (existing.data.length >= data.length) {
        return false;
      }
      existing.data = Buffer.from(data);
      return true;
    }

    this.pending.splice(low, 0, { seq, data: Buffer.from(data) });
    return true;
  }

  /**
   * Move stored segments that now touch the in-order edge into the ready queue.
   */
  private drainPending(): number {
    let delivered = 0;

    while (this.pending.length > 0) {
      const first = this.pending[0];
      const offset = seqDiff(first.seq, this.next);
      if (offset > 0) {
        break;
      }
      this.pending.shift();
      if (offset + first.data.length > 0) {
        delivered += this.deliver(first.data.subarray(-offset));
      }
    }

    return delivered;
  }
}
