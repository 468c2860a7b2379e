/**
 * Connection State Machine
 *
 * One reliable byte-stream connection between two endpoints. The connection
 * owns its transmission control block: send and receive buffers, congestion
 * controller, retransmission timer and an explicit timer queue. It never
 * reads a wall clock; every transition receives the current time.
 *
 * Handshake:
 *   active:  CLOSED --open--> SYN_SENT --SYN+ACK--> ESTABLISHED
 *   passive: CLOSED --SYN--> SYN_RECEIVED --ACK--> ESTABLISHED
 *   simultaneous: SYN_SENT --SYN--> SYN_RECEIVED
 *
 * Teardown:
 *   ESTABLISHED --close--> FIN_WAIT --FIN--> TIME_WAIT (our FIN acked)
 *                                    --FIN--> CLOSING --ACK--> TIME_WAIT
 *   ESTABLISHED --FIN--> CLOSE_WAIT --close--> LAST_ACK --ACK--> CLOSED
 *   TIME_WAIT --timer--> CLOSED
 *
 * @module engine/connection/connection
 */

import type { DatagramSender } from '../channel/types.js';
import { CongestionController, type WindowChangeReason } from '../congestion/controller.js';
import { TypedEventEmitter } from '../events.js';
import { ReceiveBuffer } from '../receive/buffer.js';
import {
  createSegment,
  encodeSegment,
  hasFlag,
  SegmentFlag,
  type Segment,
} from '../segment/codec.js';
import { seqAdd, seqDiff } from '../segment/sequence.js';
import { SendBuffer, type OutgoingData } from '../send/buffer.js';
import { TimerQueue } from '../timer/queue.js';
import { RetransmissionTimer, type ConnectionTimer } from '../timer/retransmission.js';
import {
  CongestionPhase,
  ConnectError,
  ConnectionReset,
  ConnectionState,
  InvalidStateError,
  connectionKey,
  createConnectionStats,
  formatEndpoint,
  type ConnectionHandle,
  type ConnectionInfo,
  type ConnectionStats,
  type Endpoint,
  type TransportConfig,
  type TransportError,
} from '../types.js';

// =============================================================================
// Types
// =============================================================================

/**
 * Why a segment was sent again.
 */
export type RetransmitReason = 'timeout' | 'fast-retransmit' | 'probe' | 'handshake';

/**
 * Events emitted by Connection.
 */
export interface ConnectionEvents {
  /** Emitted on every state change */
  state: { from: ConnectionState; to: ConnectionState; now: number };

  /** Emitted when the handshake completes */
  established: { now: number };

  /** Emitted when in-order bytes become readable */
  data: { bytes: number };

  /** Emitted when the peer's FIN has been consumed (no more data will arrive) */
  end: void;

  /** Emitted when acknowledged bytes leave the send buffer */
  drain: { freed: number };

  /** Emitted for every segment sent or accepted */
  segment: {
    direction: 'in' | 'out';
    segment: Segment;
    retransmission: boolean;
    now: number;
  };

  /** Emitted when a segment is sent again */
  retransmit: { seq: number; reason: RetransmitReason; now: number };

  /** Emitted when the congestion window, threshold or phase changes */
  window: {
    reason: WindowChangeReason;
    phase: CongestionPhase;
    window: number;
    threshold: number;
    now: number;
  };

  /** Emitted when the connection fails (refused, timed out or reset by the peer) */
  failed: { error: TransportError };

  /** Emitted once the connection reaches CLOSED and has released its resources */
  closed: { reset: boolean };
}

/**
 * Options for creating a connection.
 */
export interface ConnectionOptions {
  local: Endpoint;
  remote: Endpoint;

  /** Initial send sequence number */
  initialSequence: number;

  /** Where outgoing datagrams go */
  channel: DatagramSender;

  config: TransportConfig;
}

/** States in which new data and FINs may be transmitted */
const SENDING_STATES: ReadonlySet<ConnectionState> = new Set([
  ConnectionState.Established,
  ConnectionState.FinWait,
  ConnectionState.CloseWait,
  ConnectionState.Closing,
  ConnectionState.LastAck,
]);

/** States in which the application may still write */
const WRITABLE_STATES: ReadonlySet<ConnectionState> = new Set([
  ConnectionState.SynSent,
  ConnectionState.SynReceived,
  ConnectionState.Established,
  ConnectionState.CloseWait,
]);

// =============================================================================
// Connection Class
// =============================================================================

/**
 * Per-connection protocol actor.
 *
 * @example
 * ```typescript
 * const conn = new Connection({
 *   local: { address: '10.0.0.1', port: 49152 },
 *   remote: { address: '10.0.0.2', port: 80 },
 *   initialSequence: 1000,
 *   channel,
 *   config: resolveConfig(),
 * });
 *
 * conn.on('established', () => conn.write(Buffer.from('hello'), now));
 * conn.open(0);
 *
 * // later, as datagrams arrive and time passes:
 * conn.handleSegment(segment, now);
 * if ((conn.nextDeadline() ?? Infinity) <= now) conn.onTimer(now);
 * ```
 */
export class Connection extends TypedEventEmitter<ConnectionEvents> {
  readonly handle: ConnectionHandle;
  readonly local: Endpoint;
  readonly remote: Endpoint;

  private readonly config: TransportConfig;
  private readonly channel: DatagramSender;
  private readonly iss: number;

  private state_: ConnectionState = ConnectionState.Closed;
  private started = false;
  private destroyed = false;

  private readonly timers = new TimerQueue<ConnectionTimer>();
  private readonly rtx: RetransmissionTimer;
  private readonly congestion: CongestionController;
  private readonly sender: SendBuffer;
  private receiver: ReceiveBuffer | null = null;

  /** Handshake bookkeeping */
  private synSentAt = 0;
  private synRetransmitted = false;
  private synRetries = 0;

  /** Encoded datagrams refused by the channel, oldest first */
  private outbox: Buffer[] = [];
  private retryDelay: number;

  /** Window carried by the last segment we sent */
  private lastAdvertised = 0;

  /** Latest time seen by any transition */
  private clock = 0;

  private failure: TransportError | null = null;
  private readonly stats_: ConnectionStats = createConnectionStats();

  constructor(options: ConnectionOptions) {
    super();

    this.local = options.local;
    this.remote = options.remote;
    this.handle = connectionKey(options.local, options.remote);
    this.config = options.config;
    this.channel = options.channel;
    this.iss = options.initialSequence >>> 0;
    this.retryDelay = this.config.sendRetryDelay;

    this.rtx = new RetransmissionTimer(this.timers, {
      initialTimeout: this.config.initialTimeout,
      minTimeout: this.config.minTimeout,
      maxTimeout: this.config.maxTimeout,
    });

    this.congestion = new CongestionController({
      mss: this.config.mss,
      initialWindow: this.config.initialCongestionWindow,
      initialThreshold: this.config.initialSlowStartThreshold,
      duplicateAckThreshold: this.config.duplicateAckThreshold,
    });
    this.congestion.on('window', (change) => {
      this.emit('window', { ...change, now: this.clock });
    });

    this.sender = new SendBuffer({
      initialSequence: seqAdd(this.iss, 1),
      mss: this.config.mss,
      peerWindow: this.config.mss,
      congestion: this.congestion,
    });
  }

  // ===========================================================================
  // Getters
  // ===========================================================================

  get state(): ConnectionState {
    return this.state_;
  }

  /** Whether the connection has reached CLOSED and released its resources */
  get isDestroyed(): boolean {
    return this.destroyed;
  }

  /** Error that ended the connection, if it did not close gracefully */
  get error(): TransportError | null {
    return this.failure;
  }

  get stats(): Readonly<ConnectionStats> {
    return this.stats_;
  }

  /** Bytes the application could hand over and see sent right away */
  get admissibleBytes(): number {
    return this.sender.admissibleBytes();
  }

  /** Bytes written but not yet acknowledged */
  get bufferedBytes(): number {
    return this.sender.bufferedBytes;
  }

  /** Bytes received in order and not yet read */
  get readableBytes(): number {
    return this.receiver?.readableBytes ?? 0;
  }

  /** Whether the peer has finished sending */
  get remoteFinished(): boolean {
    return this.receiver?.finished ?? false;
  }

  // ===========================================================================
  // Opening
  // ===========================================================================

  /**
   * Active open: send a SYN and wait for SYN+ACK.
   *
   * @throws {InvalidStateError} If the connection was already started
   */
  open(now: number): void {
    this.assertFresh('open');
    this.clock = now;
    this.started = true;
    this.transition(ConnectionState.SynSent, now);
    this.synSentAt = now;
    this.sendControl(SegmentFlag.SYN, this.iss, now);
    this.rtx.arm(now);
  }

  /**
   * Passive open: answer a SYN received on a listening port.
   *
   * @throws {InvalidStateError} If the connection was already started
   */
  accept(syn: Segment, now: number): void {
    this.assertFresh('accept');
    if (!hasFlag(syn, 'SYN')) {
      throw new InvalidStateError('accept() needs a SYN segment', this.state_);
    }
    this.clock = now;
    this.started = true;
    this.emitSegment('in', syn, now);
    this.stats_.segmentsReceived++;

    this.synchronize(syn);
    this.transition(ConnectionState.SynReceived, now);
    this.synSentAt = now;
    this.sendControl(SegmentFlag.SYN | SegmentFlag.ACK, this.iss, now);
    this.rtx.arm(now);
  }

  // ===========================================================================
  // Application Interface
  // ===========================================================================

  /**
   * Queue bytes for transmission. Bytes written before the handshake
   * completes are held until it does.
   *
   * @returns The number of bytes accepted
   * @throws {ConnectionReset} If the connection was reset
   * @throws {InvalidStateError} If the local side is already closed
   */
  write(bytes: Buffer, now: number): number {
    this.clock = now;
    this.throwIfFailed();
    if (!WRITABLE_STATES.has(this.state_) || this.sender.finishing) {
      throw new InvalidStateError(`Cannot write: connection is ${this.state_}`, this.state_);
    }
    const accepted = this.sender.write(bytes);
    this.flush(now);
    return accepted;
  }

  /**
   * Read every byte delivered so far, in order. Chunks leave the buffer as
   * they are consumed; draining may reopen the advertised window.
   *
   * @throws {ConnectionReset} If the connection was reset
   */
  read(now: number): Generator<Buffer, void, undefined> {
    this.throwIfFailed();
    return this.drain(now);
  }

  /**
   * Graceful close of the local sending side. Idempotent once closing.
   */
  close(now: number): void {
    this.clock = now;

    switch (this.state_) {
      case ConnectionState.Closed:
        if (!this.started) {
          this.destroy(now, false);
        }
        return;

      case ConnectionState.SynSent:
      case ConnectionState.SynReceived:
        // FIN follows the queued data once the handshake completes
        this.sender.finish();
        return;

      case ConnectionState.Established:
        this.sender.finish();
        this.transition(ConnectionState.FinWait, now);
        this.flush(now);
        return;

      case ConnectionState.CloseWait:
        this.sender.finish();
        this.transition(ConnectionState.LastAck, now);
        this.flush(now);
        return;

      default:
        return;
    }
  }

  /**
   * Abrupt termination: send RST and discard all buffers.
   */
  abort(now: number): void {
    this.clock = now;
    if (this.destroyed) {
      return;
    }
    if (this.state_ !== ConnectionState.Closed && this.state_ !== ConnectionState.SynSent) {
      this.sendReset(now);
    }
    this.failure = new ConnectionReset('Connection aborted', true);
    this.destroy(now, true);
  }

  // ===========================================================================
  // Network Interface
  // ===========================================================================

  /**
   * Process a segment addressed to this connection.
   */
  handleSegment(segment: Segment, now: number): void {
    this.clock = now;
    if (this.destroyed || !this.started) {
      return;
    }

    this.stats_.segmentsReceived++;
    this.emitSegment('in', segment, now);

    if (hasFlag(segment, 'RST')) {
      this.handleReset(segment, now);
      return;
    }

    switch (this.state_) {
      case ConnectionState.SynSent:
        this.handleSynSent(segment, now);
        return;
      case ConnectionState.SynReceived:
        this.handleSynReceived(segment, now);
        return;
      default:
        this.handleSynchronized(segment, now);
    }
  }

  /**
   * Earliest pending timer deadline.
   */
  nextDeadline(): number | undefined {
    return this.timers.next();
  }

  /**
   * Run every timer due at `now`.
   */
  onTimer(now: number): void {
    this.clock = now;
    for (const kind of this.timers.expire(now)) {
      if (this.destroyed) {
        return;
      }
      switch (kind) {
        case 'retransmit':
          this.handleRetransmitTimeout(now);
          break;
        case 'time-wait':
          this.destroy(now, false);
          break;
        case 'send-retry':
          this.drainOutbox(now);
          break;
      }
    }
  }

  /**
   * Snapshot of the transmission control block.
   */
  info(): ConnectionInfo {
    return {
      handle: this.handle,
      local: this.local,
      remote: this.remote,
      state: this.state_,
      sendBase: this.sender.sendBase,
      sendNext: this.sender.sendNext,
      receiveNext: this.receiver?.receiveNext ?? 0,
      congestionWindow: this.congestion.window,
      slowStartThreshold: this.congestion.threshold,
      congestionPhase: this.congestion.phase,
      peerWindow: this.sender.peerWindow,
      receiveWindow: this.receiveWindow(),
      smoothedRtt: this.rtx.smoothedRtt,
      rttVariance: this.rtx.rttVariance,
      retransmissionTimeout: this.rtx.timeout,
      stats: { ...this.stats_ },
    };
  }

  toString(): string {
    return `${formatEndpoint(this.local)} -> ${formatEndpoint(this.remote)} [${this.state_}]`;
  }

  // ===========================================================================
  // Segment Handling
  // ===========================================================================

  private handleSynSent(segment: Segment, now: number): void {
    const syn = hasFlag(segment, 'SYN');
    const ack = hasFlag(segment, 'ACK');

    if (ack && segment.ack !== seqAdd(this.iss, 1)) {
      this.sendControl(SegmentFlag.RST, segment.ack, now);
      return;
    }

    if (syn && ack) {
      this.synchronize(segment);
      this.rtx.sample(this.synRetransmitted ? undefined : now - this.synSentAt);
      this.rtx.disarm();
      this.sender.onAck(segment.ack, segment.window, now);
      this.establish(now);
      this.sendAck(now);
      this.flush(now);
      return;
    }

    if (syn) {
      // Simultaneous open
      this.synchronize(segment);
      this.transition(ConnectionState.SynReceived, now);
      this.sendControl(SegmentFlag.SYN | SegmentFlag.ACK, this.iss, now);
    }
  }

  private handleSynReceived(segment: Segment, now: number): void {
    const ack = hasFlag(segment, 'ACK');

    if (hasFlag(segment, 'SYN') && !ack) {
      // Our SYN+ACK was lost and the peer repeated its SYN
      this.sendControl(SegmentFlag.SYN | SegmentFlag.ACK, this.iss, now);
      return;
    }
    if (!ack) {
      return;
    }
    if (segment.ack !== seqAdd(this.iss, 1)) {
      this.sendControl(SegmentFlag.RST, segment.ack, now);
      return;
    }

    this.rtx.sample(this.synRetransmitted ? undefined : now - this.synSentAt);
    this.rtx.disarm();
    this.establish(now);
    this.handleSynchronized(segment, now);
  }

  private handleSynchronized(segment: Segment, now: number): void {
    if (hasFlag(segment, 'SYN')) {
      // The peer missed our handshake ACK
      this.sendAck(now);
      return;
    }

    if (hasFlag(segment, 'ACK')) {
      this.handleAck(segment, now);
      if (this.destroyed) {
        return;
      }
    }

    if (segment.payload.length > 0 || hasFlag(segment, 'FIN')) {
      this.handleData(segment, now);
    }

    this.flush(now);
  }

  private handleAck(segment: Segment, now: number): void {
    const blocked = this.sender.admissibleBytes() === 0;
    const previousWindow = this.sender.peerWindow;
    const result = this.sender.onAck(segment.ack, segment.window, now);

    switch (result.kind) {
      case 'new':
        this.stats_.bytesAcked += result.freed;
        this.rtx.sample(result.rttSample);
        this.congestion.onNewAck();
        if (this.sender.bytesInFlight > 0) {
          this.rtx.restart(now);
        } else {
          this.rtx.disarm();
        }
        break;

      case 'duplicate':
        this.handleDuplicateAck(segment, previousWindow, now);
        break;

      case 'update':
        break;

      default:
        return;
    }

    // A pure window update can unblock a writer as well as freed bytes
    if (result.freed > 0 || (blocked && this.sender.admissibleBytes() > 0)) {
      this.emit('drain', { freed: result.freed });
    }
    if (result.finAcked) {
      this.handleFinAcked(now);
    }
  }

  private handleDuplicateAck(segment: Segment, previousWindow: number, now: number): void {
    if (previousWindow === 0) {
      if (segment.window > 0) {
        // Window reopened with a probe outstanding
        this.retransmit(now, 'probe');
        this.rtx.restart(now);
      }
      return;
    }
    if (
      segment.window !== previousWindow ||
      segment.payload.length > 0 ||
      hasFlag(segment, 'FIN') ||
      hasFlag(segment, 'SYN')
    ) {
      return;
    }

    this.stats_.duplicateAcks++;
    if (this.congestion.onDuplicateAck() === 'fast-retransmit') {
      this.stats_.fastRetransmits++;
      this.retransmit(now, 'fast-retransmit');
    }
  }

  private handleFinAcked(now: number): void {
    switch (this.state_) {
      case ConnectionState.Closing:
        this.enterTimeWait(now);
        return;
      case ConnectionState.LastAck:
        this.destroy(now, false);
        return;
      default:
        // FIN_WAIT: wait for the peer's FIN
        return;
    }
  }

  private handleData(segment: Segment, now: number): void {
    if (!this.receiver) {
      return;
    }

    if (this.state_ === ConnectionState.TimeWait) {
      // Late retransmission of the peer's FIN: our last ACK was lost
      this.sendAck(now);
      this.timers.schedule('time-wait', now + this.config.timeWaitDuration);
      return;
    }

    const result = this.receiver.onSegment(segment.seq, segment.payload, hasFlag(segment, 'FIN'));

    if (result.delivered > 0) {
      this.stats_.bytesDelivered += result.delivered;
      this.emit('data', { bytes: result.delivered });
    }

    this.sendAck(now);

    if (!result.finReceived) {
      return;
    }

    switch (this.state_) {
      case ConnectionState.Established:
        this.transition(ConnectionState.CloseWait, now);
        break;
      case ConnectionState.FinWait:
        if (this.sender.finAcked) {
          this.enterTimeWait(now);
        } else {
          this.transition(ConnectionState.Closing, now);
        }
        break;
      default:
        break;
    }
    // Listeners may close in response, so the state must already reflect the FIN
    this.emit('end');
  }

  private handleReset(segment: Segment, now: number): void {
    if (this.state_ === ConnectionState.SynSent) {
      if (hasFlag(segment, 'ACK') && segment.ack === seqAdd(this.iss, 1)) {
        this.fail(new ConnectError(`Connection refused by ${formatEndpoint(this.remote)}`, this.remote), now);
      }
      return;
    }

    if (!this.acceptableReset(segment)) {
      return;
    }

    if (this.state_ === ConnectionState.TimeWait) {
      this.destroy(now, false);
      return;
    }

    this.fail(new ConnectionReset(`Connection reset by ${formatEndpoint(this.remote)}`, false), now);
  }

  /**
   * A reset is honoured only when its sequence number lies in the receive window.
   */
  private acceptableReset(segment: Segment): boolean {
    if (!this.receiver) {
      return false;
    }
    const offset = seqDiff(segment.seq, this.receiver.receiveNext);
    const window = this.receiver.window;
    return window === 0 ? offset === 0 : offset >= 0 && offset < Math.max(window, 1);
  }

  // ===========================================================================
  // Timers
  // ===========================================================================

  private handleRetransmitTimeout(now: number): void {
    if (this.state_ === ConnectionState.SynSent || this.state_ === ConnectionState.SynReceived) {
      this.synRetries++;
      if (this.synRetries > this.config.maxSynRetries) {
        this.fail(
          new ConnectError(
            `Connection to ${formatEndpoint(this.remote)} timed out after ${this.config.maxSynRetries} retries`,
            this.remote
          ),
          now
        );
        return;
      }
      this.synRetransmitted = true;
      this.stats_.timeouts++;
      this.stats_.retransmissions++;
      this.rtx.expire(now);
      const flags =
        this.state_ === ConnectionState.SynSent ? SegmentFlag.SYN : SegmentFlag.SYN | SegmentFlag.ACK;
      this.sendControl(flags, this.iss, now, true);
      this.emit('retransmit', { seq: this.iss, reason: 'handshake', now });
      return;
    }

    if (!SENDING_STATES.has(this.state_)) {
      return;
    }

    if (this.sender.bytesInFlight === 0) {
      const probe = this.sender.probeSegment(now);
      if (probe) {
        this.transmitData(probe, now);
        this.rtx.expire(now);
        this.emit('retransmit', { seq: probe.seq, reason: 'probe', now });
      }
      return;
    }

    if (this.sender.peerWindow === 0) {
      // Window probe outstanding: repeat it without treating it as congestion
      this.retransmit(now, 'probe');
      this.rtx.expire(now);
      return;
    }

    this.stats_.timeouts++;
    this.congestion.onTimeout();
    this.retransmit(now, 'timeout');
    this.rtx.expire(now);
  }

  private enterTimeWait(now: number): void {
    this.rtx.disarm();
    this.transition(ConnectionState.TimeWait, now);
    this.timers.schedule('time-wait', now + this.config.timeWaitDuration);
  }

  // ===========================================================================
  // Transmission
  // ===========================================================================

  /**
   * Send every new segment the windows allow, and keep the timer running
   * while anything is outstanding.
   */
  private flush(now: number): void {
    if (!SENDING_STATES.has(this.state_)) {
      return;
    }

    let out = this.sender.nextSegment(now);
    while (out !== null) {
      this.transmitData(out, now);
      out = this.sender.nextSegment(now);
    }

    if (this.sender.bytesInFlight > 0) {
      this.rtx.arm(now);
    } else if (this.sender.peerWindow === 0 && this.sender.unsentBytes > 0) {
      // Zero window: schedule a probe
      this.rtx.arm(now);
    }
  }

  private retransmit(now: number, reason: RetransmitReason): void {
    const out = this.sender.retransmitOldest(now);
    if (!out) {
      return;
    }
    this.stats_.retransmissions++;
    this.transmitData(out, now);
    this.emit('retransmit', { seq: out.seq, reason, now });
  }

  private transmitData(out: OutgoingData, now: number): void {
    let flags: number = SegmentFlag.ACK;
    if (out.fin) flags |= SegmentFlag.FIN;
    if (out.payload.length > 0) flags |= SegmentFlag.PSH;

    if (!out.retransmission && out.payload.length > 0) {
      this.stats_.dataSegmentsSent++;
      this.stats_.bytesSent += out.payload.length;
    }

    this.transmit(
      {
        seq: out.seq,
        ack: this.receiver?.receiveNext ?? 0,
        flags,
        payload: out.payload,
      },
      now,
      out.retransmission
    );
  }

  private sendAck(now: number): void {
    this.transmit(
      {
        seq: this.sender.sendNext,
        ack: this.receiver?.receiveNext ?? 0,
        flags: SegmentFlag.ACK,
      },
      now,
      false
    );
  }

  private sendControl(flags: number, seq: number, now: number, retransmission = false): void {
    const ack = (flags & SegmentFlag.ACK) !== 0 ? (this.receiver?.receiveNext ?? 0) : 0;
    this.transmit({ seq, ack, flags }, now, retransmission);
  }

  private sendReset(now: number): void {
    this.transmit(
      {
        seq: this.sender.sendNext,
        ack: this.receiver?.receiveNext ?? 0,
        flags: SegmentFlag.RST | (this.receiver ? SegmentFlag.ACK : 0),
      },
      now,
      false
    );
  }

  private transmit(
    fields: { seq: number; ack: number; flags: number; payload?: Buffer },
    now: number,
    retransmission: boolean
  ): void {
    const window = this.receiveWindow();
    const segment = createSegment({
      sourcePort: this.local.port,
      destinationPort: this.remote.port,
      seq: fields.seq,
      ack: fields.ack,
      flags: fields.flags,
      window,
      payload: fields.payload,
    });
    this.lastAdvertised = window;
    this.stats_.segmentsSent++;
    this.emitSegment('out', segment, now, retransmission);

    const datagram = encodeSegment(segment);
    if (this.outbox.length > 0) {
      this.outbox.push(datagram);
      return;
    }

    const result = this.channel.send(datagram, this.remote.address);
    if (!result.ok) {
      this.outbox.push(datagram);
      this.scheduleRetry(now);
    }
  }

  /**
   * Retry datagrams the channel refused, in order, backing off while it
   * keeps refusing.
   */
  private drainOutbox(now: number): void {
    while (this.outbox.length > 0) {
      const result = this.channel.send(this.outbox[0], this.remote.address);
      if (!result.ok) {
        this.retryDelay = Math.min(this.retryDelay * 2, this.config.maxSendRetryDelay);
        this.scheduleRetry(now);
        return;
      }
      this.outbox.shift();
    }
    this.retryDelay = this.config.sendRetryDelay;
  }

  private scheduleRetry(now: number): void {
    this.stats_.sendRetries++;
    this.timers.schedule('send-retry', now + this.retryDelay);
  }

  // ===========================================================================
  // Private Helpers
  // ===========================================================================

  private *drain(now: number): Generator<Buffer, void, undefined> {
    if (!this.receiver) {
      return;
    }
    try {
      yield* this.receiver.read();
    } finally {
      this.afterRead(now);
    }
  }

  /**
   * Tell the peer when reading has reopened a window it saw as (nearly) closed.
   */
  private afterRead(now: number): void {
    this.clock = now;
    if (this.destroyed || !this.receiver) {
      return;
    }
    if (this.state_ !== ConnectionState.Established && this.state_ !== ConnectionState.FinWait) {
      return;
    }
    if (this.lastAdvertised < this.config.mss && this.receiver.window >= this.config.mss) {
      this.sendAck(now);
    }
  }

  private synchronize(segment: Segment): void {
    this.receiver = new ReceiveBuffer({
      initialSequence: seqAdd(segment.seq, 1),
      maxWindow: this.config.maxReceiveWindow,
    });
    this.sender.setPeerWindow(segment.window);
  }

  private establish(now: number): void {
    this.transition(ConnectionState.Established, now);
    this.emit('established', { now });
    if (this.sender.finishing && this.state_ === ConnectionState.Established) {
      this.transition(ConnectionState.FinWait, now);
    }
  }

  private receiveWindow(): number {
    return this.receiver?.window ?? this.config.maxReceiveWindow;
  }

  private transition(to: ConnectionState, now: number): void {
    const from = this.state_;
    if (from === to) {
      return;
    }
    this.state_ = to;
    this.emit('state', { from, to, now });
  }

  private fail(error: TransportError, now: number): void {
    this.failure = error;
    this.emit('failed', { error });
    this.destroy(now, true);
  }

  /**
   * Enter CLOSED and release buffers and timers. After a graceful close,
   * bytes already delivered stay readable.
   */
  private destroy(now: number, reset: boolean): void {
    if (this.destroyed) {
      return;
    }
    this.destroyed = true;
    this.timers.clear();
    this.outbox = [];
    this.sender.clear();
    if (reset) {
      this.receiver?.clear();
    } else {
      this.receiver?.discardPending();
    }
    this.transition(ConnectionState.Closed, now);
    this.congestion.removeAllListeners();
    this.emit('closed', { reset });
  }

  private throwIfFailed(): void {
    if (this.failure) {
      throw this.failure;
    }
  }

  private assertFresh(operation: string): void {
    if (this.started || this.destroyed) {
      throw new InvalidStateError(`Cannot ${operation}: connection is ${this.state_}`, this.state_);
    }
  }

  private emitSegment(direction: 'in' | 'out', segment: Segment, now: number, retransmission = false): void {
    this.emit('segment', { direction, segment, retransmission, now });
  }
}
