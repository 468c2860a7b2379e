/**
 * Send Buffer & Sliding Window
 *
 * Holds every application byte that has not been acknowledged yet, tagged
 * implicitly by its absolute sequence number (`sendBase` + offset). New bytes
 * are admitted into flight only while `min(cwnd, peer window)` allows it;
 * acknowledged bytes are released, and retransmissions reuse the original
 * sequence numbers.
 *
 * A FIN queued with {@link SendBuffer.finish} occupies one sequence number
 * after the last data byte and travels through the same flight bookkeeping.
 *
 * @module engine/send/buffer
 */

import { seqAdd, seqDiff, seqGt, seqLt } from '../segment/sequence.js';

// =============================================================================
// Types
// =============================================================================

/**
 * Source of the current congestion window.
 */
export interface WindowSource {
  readonly window: number;
}

/**
 * Options for creating a send buffer.
 */
export interface SendBufferOptions {
  /** Sequence number of the first data byte (ISS + 1) */
  initialSequence: number;

  mss: number;

  /** Receive window advertised by the peer so far */
  peerWindow: number;

  congestion: WindowSource;
}

/**
 * A chunk of sequence space handed to the network and not yet acknowledged.
 */
interface Flight {
  seq: number;

  /** Payload bytes (excluding the FIN) */
  length: number;

  fin: boolean;
  sentAt: number;
  retransmitted: boolean;
}

/**
 * Written bytes kept as the chunks they arrived in, so appending and
 * releasing from the front never copy the whole backlog.
 */
class ByteQueue {
  private chunks: Buffer[] = [];

  /** Bytes of the first chunk already released */
  private head = 0;
  private size = 0;

  get length(): number {
    return this.size;
  }

  push(bytes: Buffer): void {
    this.chunks.push(Buffer.from(bytes));
    this.size += bytes.length;
  }

  /**
   * Release `count` bytes from the front.
   */
  drop(count: number): void {
    let remaining = Math.min(count, this.size);
    this.size -= remaining;

    while (remaining > 0) {
      const first = this.chunks[0];
      if (!first) {
        break;
      }
      const available = first.length - this.head;
      if (remaining < available) {
        this.head += remaining;
        return;
      }
      remaining -= available;
      this.chunks.shift();
      this.head = 0;
    }
  }

  /**
   * Copy `length` bytes starting `offset` bytes from the front.
   */
  copy(offset: number, length: number): Buffer {
    const parts: Buffer[] = [];
    let skip = offset + this.head;
    let wanted = length;

    for (const chunk of this.chunks) {
      if (wanted <= 0) {
        break;
      }
      if (skip >= chunk.length) {
        skip -= chunk.length;
        continue;
      }
      const part = chunk.subarray(skip, skip + wanted);
      parts.push(part);
      wanted -= part.length;
      skip = 0;
    }

    return Buffer.concat(parts);
  }

  clear(): void {
    this.chunks = [];
    this.head = 0;
    this.size = 0;
  }
}

/**
 * A segment the connection should transmit.
 */
export interface OutgoingData {
  seq: number;
  payload: Buffer;
  fin: boolean;
  retransmission: boolean;
}

/**
 * Classification of an incoming acknowledgment number.
 */
export type AckKind =
  /** Advanced the window edge */
  | 'new'
  /** Equal to the edge while data is outstanding */
  | 'duplicate'
  /** Equal to the edge with nothing outstanding (window update) */
  | 'update'
  /** Below the edge */
  | 'stale'
  /** Acknowledges sequence space never sent */
  | 'invalid';

/**
 * Result of processing an acknowledgment.
 */
export interface AckResult {
  kind: AckKind;

  /** Data bytes released from the buffer */
  freed: number;

  /**
   * Round-trip time of the oldest covered segment; undefined when that
   * segment was retransmitted or nothing was covered
   */
  rttSample?: number;

  /** Whether this ACK covered our FIN */
  finAcked: boolean;
}

// =============================================================================
// SendBuffer Class
// =============================================================================

/**
 * Unacknowledged byte store with window-limited admission.
 *
 * @example
 * ```typescript
 * const buffer = new SendBuffer({ initialSequence: 1001, mss: 500, peerWindow: 65535, congestion: cc });
 * buffer.write(Buffer.from('hello'));
 *
 * let out;
 * while ((out = buffer.nextSegment(now)) !== null) {
 *   transmit(out);
 * }
 *
 * const { kind, freed } = buffer.onAck(1006, 65535, later);
 * ```
 */
export class SendBuffer {
  private readonly mss: number;
  private readonly congestion: WindowSource;

  /** Oldest unacknowledged sequence number */
  private base: number;

  /** Next sequence number to send */
  private next: number;

  /** Bytes from `base` onwards: in flight first, then unsent */
  private readonly data = new ByteQueue();

  private flights: Flight[] = [];
  private peerWindow_: number;

  private finQueued = false;
  private finSent = false;
  private finAcked_ = false;

  constructor(options: SendBufferOptions) {
    this.mss = options.mss;
    this.congestion = options.congestion;
    this.base = options.initialSequence;
    this.next = options.initialSequence;
    this.peerWindow_ = options.peerWindow;
  }

  // ===========================================================================
  // Getters
  // ===========================================================================

  /** Oldest unacknowledged sequence number (the send window edge) */
  get sendBase(): number {
    return this.base;
  }

  /** Next sequence number to be sent */
  get sendNext(): number {
    return this.next;
  }

  /** Sequence space sent but not acknowledged (a FIN counts as one) */
  get bytesInFlight(): number {
    return seqDiff(this.next, this.base);
  }

  /** Data bytes written but never sent */
  get unsentBytes(): number {
    return this.data.length - this.sentDataBytes();
  }

  /** Data bytes held, sent or not */
  get bufferedBytes(): number {
    return this.data.length;
  }

  get peerWindow(): number {
    return this.peerWindow_;
  }

  /** Whether {@link finish} has been called */
  get finishing(): boolean {
    return this.finQueued;
  }

  /** Whether the FIN has been acknowledged */
  get finAcked(): boolean {
    return this.finAcked_;
  }

  /** Whether anything (data or FIN) still waits for its first transmission */
  get hasUnsent(): boolean {
    return this.unsentBytes > 0 || (this.finQueued && !this.finSent);
  }

  // ===========================================================================
  // Application Side
  // ===========================================================================

  /**
   * Append bytes. Always accepts everything; back-pressure is exposed through
   * {@link admissibleBytes}.
   *
   * @returns The number of bytes accepted
   */
  write(bytes: Buffer): number {
    if (this.finQueued) {
      throw new Error('Cannot write after finish()');
    }
    if (bytes.length > 0) {
      this.data.push(bytes);
    }
    return bytes.length;
  }

  /**
   * Queue a FIN after the data written so far.
   */
  finish(): void {
    this.finQueued = true;
  }

  /**
   * Update the peer's advertised window.
   */
  setPeerWindow(window: number): void {
    this.peerWindow_ = window;
  }

  /**
   * New bytes that may be put in flight right now:
   * `min(cwnd, peer window) - bytesInFlight`, never negative.
   */
  admissibleBytes(): number {
    const limit = Math.min(this.congestion.window, this.peerWindow_);
    return Math.max(0, limit - this.bytesInFlight);
  }

  // ===========================================================================
  // Transmission
  // ===========================================================================

  /**
   * Carve the next new segment out of the unsent bytes, or return null when
   * the window (or the sender-side silly-window rule) does not allow one.
   *
   * A partial segment is only sent when it carries the rest of the data or
   * nothing else is in flight. The FIN rides on the last data segment, or
   * goes alone once the data is out.
   */
  nextSegment(now: number): OutgoingData | null {
    const unsent = this.unsentBytes;

    if (unsent === 0) {
      if (!this.finQueued || this.finSent) {
        return null;
      }
      return this.record(now, 0, true);
    }

    const size = Math.min(this.admissibleBytes(), this.mss, unsent);
    if (size <= 0) {
      return null;
    }
    if (size < this.mss && size < unsent && this.bytesInFlight > 0) {
      return null;
    }

    const fin = this.finQueued && size === unsent;
    return this.record(now, size, fin);
  }

  /**
   * Re-send exactly the oldest unacknowledged segment with its original
   * sequence number.
   */
  retransmitOldest(now: number): OutgoingData | null {
    const oldest = this.flights[0];
    if (!oldest) {
      return null;
    }

    oldest.retransmitted = true;
    oldest.sentAt = now;

    return {
      seq: oldest.seq,
      payload: this.slice(oldest.seq, oldest.length),
      fin: oldest.fin,
      retransmission: true,
    };
  }

  /**
   * Send one byte past a zero window so the peer answers with its current
   * window. Only applies when nothing is in flight.
   */
  probeSegment(now: number): OutgoingData | null {
    if (this.peerWindow_ > 0 || this.bytesInFlight > 0 || this.unsentBytes === 0) {
      return null;
    }
    return this.record(now, 1, this.finQueued && this.unsentBytes === 1);
  }

  // ===========================================================================
  // Acknowledgment
  // ===========================================================================

  /**
   * Process a cumulative acknowledgment.
   */
  onAck(ack: number, window: number, now: number): AckResult {
    if (seqLt(ack, this.base)) {
      return { kind: 'stale', freed: 0, finAcked: false };
    }
    if (seqGt(ack, this.next)) {
      return { kind: 'invalid', freed: 0, finAcked: false };
    }

    this.peerWindow_ = window;

    if (ack === this.base) {
      return {
        kind: this.bytesInFlight > 0 ? 'duplicate' : 'update',
        freed: 0,
        finAcked: false,
      };
    }

    const acked = seqDiff(ack, this.base);
    const finAcked = this.finSent && ack === this.next;
    const freed = acked - (finAcked ? 1 : 0);

    const oldest = this.flights[0];
    const rttSample = oldest && !oldest.retransmitted ? now - oldest.sentAt : undefined;

    // Drop covered flights, trimming one that is only partly acknowledged
    while (this.flights.length > 0) {
      const flight = this.flights[0];
      const end = seqAdd(flight.seq, flight.length + (flight.fin ? 1 : 0));
      if (!seqGt(end, ack)) {
        this.flights.shift();
        continue;
      }
      const covered = seqDiff(ack, flight.seq);
      if (covered > 0) {
        flight.seq = ack;
        flight.length -= covered;
      }
      break;
    }

    this.data.drop(freed);
    this.base = ack;
    if (finAcked) {
      this.finAcked_ = true;
    }

    return { kind: 'new', freed, rttSample, finAcked };
  }

  /**
   * Release everything (connection destroyed).
   */
  clear(): void {
    this.data.clear();
    this.flights = [];
  }

  // ===========================================================================
  // Private Methods
  // ===========================================================================

  private sentDataBytes(): number {
    return this.bytesInFlight - (this.finSent ? 1 : 0);
  }

  private slice(seq: number, length: number): Buffer {
    const offset = seqDiff(seq, this.base);
    return this.data.copy(offset, length);
  }

  private record(now: number, length: number, fin: boolean): OutgoingData {
    const seq = this.next;
    this.flights.push({ seq, length, fin, sentAt: now, retransmitted: false });
    this.next = seqAdd(this.next, length + (fin ? 1 : 0));
    if (fin) {
      this.finSent = true;
    }
    return { seq, payload: this.slice(seq, length), fin, retransmission: false };
  }
}
