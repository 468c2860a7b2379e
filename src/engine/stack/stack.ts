/**
 * Transport Stack
 *
 * The application-facing side of the engine for one host. A stack owns every
 * connection of its host, demultiplexes incoming datagrams by
 * (remote address, remote port, local port), answers SYNs on listening ports,
 * resets segments nobody expects and drives connection timers.
 *
 * The stack has no clock of its own: the host scheduler (see the Simulator)
 * calls {@link TransportStack.poll} with the current time whenever datagrams
 * may have arrived or {@link TransportStack.nextDeadline} has passed.
 *
 * @module engine/stack/stack
 *
 * @example
 * ```typescript
 * const server = new TransportStack({ channel: network.attach('10.0.0.2') });
 * server.listen(80);
 * server.on('connection:incoming', ({ handle }) => {
 *   for (const chunk of server.read(handle, now)) {
 *     // ...
 *   }
 * });
 *
 * const client = new TransportStack({ channel: network.attach('10.0.0.1') });
 * const handle = await client.connect({ address: '10.0.0.2', port: 80 }, now);
 * client.write(handle, Buffer.from('hello'), now);
 * client.close(handle, now);
 * ```
 */

import type { Channel } from '../channel/types.js';
import { resolveConfig } from '../config/defaults.js';
import type { WindowChangeReason } from '../congestion/controller.js';
import { Connection, type RetransmitReason } from '../connection/connection.js';
import { TypedEventEmitter } from '../events.js';
import {
  createSegment,
  decodeSegment,
  encodeSegment,
  hasFlag,
  segmentLength,
  SegmentFlag,
  type Segment,
} from '../segment/codec.js';
import { seqAdd } from '../segment/sequence.js';
import {
  ChecksumError,
  ConnectError,
  ConnectionState,
  InvalidStateError,
  MalformedError,
  connectionKey,
  formatEndpoint,
  type CongestionPhase,
  type ConnectionHandle,
  type ConnectionInfo,
  type ConnectionStats,
  type Endpoint,
  type PartialTransportConfig,
  type TransportConfig,
  type TransportError,
} from '../types.js';
import { randomInt, randomSequence, type RandomSource } from '../utils/random.js';

// =============================================================================
// Types
// =============================================================================

/**
 * Why an incoming datagram was discarded without reaching a connection.
 */
export type DropReason = 'malformed' | 'checksum' | 'no-connection';

/**
 * Events emitted by TransportStack. Connection events carry the handle.
 */
export interface TransportStackEvents {
  /** A passive connection completed its handshake and joined the accept backlog */
  'connection:incoming': { handle: ConnectionHandle };

  'connection:established': { handle: ConnectionHandle; now: number };
  'connection:state': { handle: ConnectionHandle; from: ConnectionState; to: ConnectionState; now: number };
  'connection:data': { handle: ConnectionHandle; bytes: number };
  'connection:end': { handle: ConnectionHandle };
  'connection:drain': { handle: ConnectionHandle; freed: number };
  'connection:failed': { handle: ConnectionHandle; error: TransportError };
  'connection:closed': { handle: ConnectionHandle; reset: boolean };

  /** Every segment a connection sends or accepts */
  'segment': {
    handle: ConnectionHandle;
    direction: 'in' | 'out';
    segment: Segment;
    retransmission: boolean;
    now: number;
  };
  'segment:retransmit': { handle: ConnectionHandle; seq: number; reason: RetransmitReason; now: number };
  'segment:dropped': { from: string; reason: DropReason; error?: TransportError; now: number };

  'congestion:window': {
    handle: ConnectionHandle;
    reason: WindowChangeReason;
    phase: CongestionPhase;
    window: number;
    threshold: number;
    now: number;
  };
}

/**
 * Options for creating a transport stack.
 */
export interface TransportStackOptions {
  channel: Channel;
  config?: PartialTransportConfig;

  /** Source for initial sequence numbers and ephemeral ports (default: Math.random) */
  random?: RandomSource;
}

/**
 * Host-level counters.
 */
export interface StackStats {
  malformed: number;
  checksumErrors: number;

  /** Resets sent in answer to segments for no connection */
  resetsSent: number;

  connectionsOpened: number;
  connectionsAccepted: number;
}

/** First port handed out for active opens */
const EPHEMERAL_PORT_MIN = 49152;
const EPHEMERAL_PORT_MAX = 65535;

// =============================================================================
// TransportStack Class
// =============================================================================

/**
 * Reliable transport for one host.
 */
export class TransportStack extends TypedEventEmitter<TransportStackEvents> {
  readonly address: string;
  readonly config: TransportConfig;

  private readonly channel: Channel;
  private readonly random: RandomSource;

  /** Every connection by handle, closed ones included until released */
  private readonly connections: Map<ConnectionHandle, Connection> = new Map();

  /** Connections not yet CLOSED; the demultiplexing table */
  private readonly active: Map<ConnectionHandle, Connection> = new Map();

  private readonly listeners: Set<number> = new Set();
  private backlog: ConnectionHandle[] = [];
  private nextEphemeral: number;

  private readonly stats_: StackStats = {
    malformed: 0,
    checksumErrors: 0,
    resetsSent: 0,
    connectionsOpened: 0,
    connectionsAccepted: 0,
  };

  /**
   * @throws {ConfigError} If the configuration is invalid
   */
  constructor(options: TransportStackOptions) {
    super();
    this.channel = options.channel;
    this.address = options.channel.address;
    this.config = resolveConfig(options.config);
    this.random = options.random ?? Math.random;
    this.nextEphemeral =
      EPHEMERAL_PORT_MIN + randomInt(this.random, EPHEMERAL_PORT_MAX - EPHEMERAL_PORT_MIN + 1);
  }

  // ===========================================================================
  // Getters
  // ===========================================================================

  get stats(): Readonly<StackStats> {
    return this.stats_;
  }

  /** Number of connections that have not reached CLOSED */
  get activeConnections(): number {
    return this.active.size;
  }

  // ===========================================================================
  // Listening
  // ===========================================================================

  /**
   * Accept incoming connections on a port.
   */
  listen(port: number): void {
    assertPort(port);
    this.listeners.add(port);
  }

  /**
   * Stop accepting new connections on a port. Existing ones are unaffected.
   */
  unlisten(port: number): void {
    this.listeners.delete(port);
  }

  /**
   * Take the oldest established incoming connection from the backlog.
   */
  accept(): ConnectionHandle | undefined {
    return this.backlog.shift();
  }

  // ===========================================================================
  // Opening
  // ===========================================================================

  /**
   * Start an active open and return the new connection's handle at once.
   *
   * @throws {ConnectError} If the remote endpoint is invalid or a connection
   *   to it already exists from the requested local port
   */
  open(remote: Endpoint, now: number, localPort?: number): ConnectionHandle {
    if (!Number.isInteger(remote.port) || remote.port < 1 || remote.port > EPHEMERAL_PORT_MAX) {
      throw new ConnectError(`Invalid remote port ${remote.port}`, remote);
    }
    if (remote.address.length === 0) {
      throw new ConnectError('Remote address is empty', remote);
    }

    const port = localPort ?? this.allocatePort(remote);
    const local = { address: this.address, port };
    const handle = connectionKey(local, remote);
    if (this.active.has(handle)) {
      throw new ConnectError(`Connection ${handle} already exists`, remote);
    }

    const connection = this.register(local, remote, false);
    this.stats_.connectionsOpened++;
    connection.open(now);
    return handle;
  }

  /**
   * Open a connection and resolve once the handshake completes.
   *
   * @returns Promise resolving to the handle; rejects with ConnectError when
   *   the peer refuses, the handshake times out or the open is abandoned
   */
  connect(remote: Endpoint, now: number, localPort?: number): Promise<ConnectionHandle> {
    return new Promise((resolve, reject) => {
      let handle: ConnectionHandle;
      try {
        handle = this.open(remote, now, localPort);
      } catch (error) {
        reject(error);
        return;
      }

      const connection = this.require(handle);
      const onEstablished = (): void => {
        connection.off('closed', onClosed);
        resolve(handle);
      };
      const onClosed = (): void => {
        connection.off('established', onEstablished);
        reject(
          connection.error ?? new ConnectError(`Connection to ${formatEndpoint(remote)} closed`, remote)
        );
      };

      connection.once('established', onEstablished);
      connection.once('closed', onClosed);
    });
  }

  // ===========================================================================
  // Data Transfer
  // ===========================================================================

  /**
   * Queue bytes on a connection.
   *
   * @returns The number of bytes accepted
   * @throws {ConnectionReset} If the connection was reset
   * @throws {InvalidStateError} If the handle is unknown or the local side closed
   */
  write(handle: ConnectionHandle, bytes: Buffer, now: number): number {
    return this.require(handle).write(bytes, now);
  }

  /**
   * Drain bytes delivered so far. Empty when nothing is ready.
   *
   * @throws {ConnectionReset} If the connection was reset
   */
  read(handle: ConnectionHandle, now: number): Generator<Buffer, void, undefined> {
    return this.require(handle).read(now);
  }

  /**
   * Read everything delivered so far into one buffer.
   */
  readAll(handle: ConnectionHandle, now: number): Buffer {
    return Buffer.concat([...this.read(handle, now)]);
  }

  /**
   * Resolve when the connection can put new bytes in flight, or reject if it
   * closes first.
   */
  whenWritable(handle: ConnectionHandle): Promise<void> {
    const connection = this.require(handle);
    if (connection.admissibleBytes > 0 || connection.isDestroyed) {
      return connection.error ? Promise.reject(connection.error) : Promise.resolve();
    }

    return new Promise((resolve, reject) => {
      const onDrain = (): void => {
        // Freed bytes do not help while the peer window stays shut
        if (connection.admissibleBytes === 0) {
          return;
        }
        connection.off('drain', onDrain);
        connection.off('closed', onClosed);
        resolve();
      };
      const onClosed = (): void => {
        connection.off('drain', onDrain);
        if (connection.error) {
          reject(connection.error);
        } else {
          resolve();
        }
      };
      connection.on('drain', onDrain);
      connection.once('closed', onClosed);
    });
  }

  // ===========================================================================
  // Closing
  // ===========================================================================

  /**
   * Graceful close of the local sending side.
   */
  close(handle: ConnectionHandle, now: number): void {
    this.require(handle).close(now);
  }

  /**
   * Immediate termination with RST.
   */
  abort(handle: ConnectionHandle, now: number): void {
    this.require(handle).abort(now);
  }

  /**
   * Forget a connection that has reached CLOSED.
   *
   * @throws {InvalidStateError} If the connection is still open
   */
  release(handle: ConnectionHandle): void {
    const connection = this.connections.get(handle);
    if (!connection) {
      return;
    }
    if (!connection.isDestroyed) {
      throw new InvalidStateError(`Cannot release open connection ${handle}`, connection.state);
    }
    connection.removeAllListeners();
    this.connections.delete(handle);
  }

  // ===========================================================================
  // Inspection
  // ===========================================================================

  getState(handle: ConnectionHandle): ConnectionState {
    return this.require(handle).state;
  }

  getInfo(handle: ConnectionHandle): ConnectionInfo {
    return this.require(handle).info();
  }

  getStats(handle: ConnectionHandle): ConnectionStats {
    return { ...this.require(handle).stats };
  }

  /**
   * Handles of every known connection, closed ones included.
   */
  getConnections(): ConnectionHandle[] {
    return [...this.connections.keys()];
  }

  // ===========================================================================
  // Scheduling
  // ===========================================================================

  /**
   * Process every datagram that has arrived and every timer that is due.
   */
  poll(now: number): void {
    for (const { datagram, from } of this.channel.receive(now)) {
      this.dispatch(datagram, from, now);
    }

    for (const connection of [...this.active.values()]) {
      const deadline = connection.nextDeadline();
      if (deadline !== undefined && deadline <= now) {
        connection.onTimer(now);
      }
    }
  }

  /**
   * Earliest timer deadline across all connections.
   */
  nextDeadline(): number | undefined {
    let earliest: number | undefined;
    for (const connection of this.active.values()) {
      const deadline = connection.nextDeadline();
      if (deadline !== undefined && (earliest === undefined || deadline < earliest)) {
        earliest = deadline;
      }
    }
    return earliest;
  }

  // ===========================================================================
  // Private Methods
  // ===========================================================================

  private dispatch(datagram: Buffer, from: string, now: number): void {
    let segment: Segment;
    try {
      segment = decodeSegment(datagram);
    } catch (error) {
      if (error instanceof MalformedError) {
        this.stats_.malformed++;
        this.emit('segment:dropped', { from, reason: 'malformed', error, now });
        return;
      }
      if (error instanceof ChecksumError) {
        this.stats_.checksumErrors++;
        this.emit('segment:dropped', { from, reason: 'checksum', error, now });
        return;
      }
      throw error;
    }

    const local = { address: this.address, port: segment.destinationPort };
    const remote = { address: from, port: segment.sourcePort };
    const existing = this.active.get(connectionKey(local, remote));
    if (existing) {
      existing.handleSegment(segment, now);
      return;
    }

    if (
      hasFlag(segment, 'SYN') &&
      !hasFlag(segment, 'ACK') &&
      !hasFlag(segment, 'RST') &&
      this.listeners.has(segment.destinationPort)
    ) {
      const connection = this.register(local, remote, true);
      connection.accept(segment, now);
      return;
    }

    this.emit('segment:dropped', { from, reason: 'no-connection', now });
    if (!hasFlag(segment, 'RST')) {
      this.sendReset(segment, from);
    }
  }

  /**
   * Answer a segment that matches no connection.
   */
  private sendReset(segment: Segment, to: string): void {
    const reply = hasFlag(segment, 'ACK')
      ? { seq: segment.ack, ack: 0, flags: SegmentFlag.RST }
      : {
          seq: 0,
          ack: seqAdd(segment.seq, segmentLength(segment)),
          flags: SegmentFlag.RST | SegmentFlag.ACK,
        };

    const reset = createSegment({
      sourcePort: segment.destinationPort,
      destinationPort: segment.sourcePort,
      window: 0,
      ...reply,
    });

    // A refused reset is not retried; the peer's own timers recover
    if (this.channel.send(encodeSegment(reset), to).ok) {
      this.stats_.resetsSent++;
    }
  }

  private register(local: Endpoint, remote: Endpoint, passive: boolean): Connection {
    const connection = new Connection({
      local,
      remote,
      initialSequence: randomSequence(this.random),
      channel: this.channel,
      config: this.config,
    });
    const handle = connection.handle;

    connection.on('state', ({ from, to, now }) => {
      this.emit('connection:state', { handle, from, to, now });
    });
    connection.on('established', ({ now }) => {
      this.emit('connection:established', { handle, now });
      if (passive) {
        this.stats_.connectionsAccepted++;
        this.backlog.push(handle);
        this.emit('connection:incoming', { handle });
      }
    });
    connection.on('data', ({ bytes }) => this.emit('connection:data', { handle, bytes }));
    connection.on('end', () => this.emit('connection:end', { handle }));
    connection.on('drain', ({ freed }) => this.emit('connection:drain', { handle, freed }));
    connection.on('failed', ({ error }) => this.emit('connection:failed', { handle, error }));
    connection.on('segment', (event) => this.emit('segment', { handle, ...event }));
    connection.on('retransmit', (event) => this.emit('segment:retransmit', { handle, ...event }));
    connection.on('window', (event) => this.emit('congestion:window', { handle, ...event }));
    connection.on('closed', ({ reset }) => {
      this.active.delete(handle);
      this.backlog = this.backlog.filter((queued) => queued !== handle);
      this.emit('connection:closed', { handle, reset });
    });

    this.connections.set(handle, connection);
    this.active.set(handle, connection);
    return connection;
  }

  private allocatePort(remote: Endpoint): number {
    const span = EPHEMERAL_PORT_MAX - EPHEMERAL_PORT_MIN + 1;
    for (let attempt = 0; attempt < span; attempt++) {
      const port = this.nextEphemeral;
      this.nextEphemeral = port === EPHEMERAL_PORT_MAX ? EPHEMERAL_PORT_MIN : port + 1;
      const handle = connectionKey({ address: this.address, port }, remote);
      if (!this.active.has(handle) && !this.listeners.has(port)) {
        return port;
      }
    }
    throw new ConnectError('No ephemeral port available', remote);
  }

  private require(handle: ConnectionHandle): Connection {
    const connection = this.connections.get(handle);
    if (!connection) {
      throw new InvalidStateError(`Unknown connection ${handle}`, ConnectionState.Closed);
    }
    return connection;
  }
}

// =============================================================================
// Helper Functions
// =============================================================================

function assertPort(port: number): void {
  if (!Number.isInteger(port) || port < 1 || port > EPHEMERAL_PORT_MAX) {
    throw new RangeError(`Port must be an integer between 1 and ${EPHEMERAL_PORT_MAX}, got ${port}`);
  }
}
