/**
 * Core type definitions for the transport engine.
 *
 * These types define the fundamental data structures shared by the segment
 * codec, the per-connection state machine, the transport stack and the
 * network simulator, together with the engine's error hierarchy.
 *
 * @module engine/types
 */

// =============================================================================
// Enums
// =============================================================================

/**
 * Lifecycle state of a single connection.
 *
 * State transitions:
 *   CLOSED -> SYN_SENT -> ESTABLISHED -> FIN_WAIT -> (CLOSING) -> TIME_WAIT -> CLOSED
 *   CLOSED -> SYN_RECEIVED -> ESTABLISHED -> CLOSE_WAIT -> LAST_ACK -> CLOSED
 *
 * Any state falls back to CLOSED on reset or abort.
 */
export enum ConnectionState {
  /** No connection, or the connection has been torn down */
  Closed = 'closed',

  /** Active open: SYN sent, waiting for SYN+ACK */
  SynSent = 'syn-sent',

  /** Passive open: SYN received, SYN+ACK sent, waiting for ACK */
  SynReceived = 'syn-received',

  /** Handshake complete, data flows both ways */
  Established = 'established',

  /** Local side closed; waiting for the peer's FIN (our FIN may be acked already) */
  FinWait = 'fin-wait',

  /** Peer closed; local side may still send */
  CloseWait = 'close-wait',

  /** Both sides sent FIN before seeing an ACK for ours */
  Closing = 'closing',

  /** Peer closed first and we sent our FIN; waiting for its ACK */
  LastAck = 'last-ack',

  /** Both FINs acknowledged; absorbing late segments before destruction */
  TimeWait = 'time-wait',
}

/**
 * Congestion control phase.
 */
export enum CongestionPhase {
  SlowStart = 'slow-start',
  CongestionAvoidance = 'congestion-avoidance',
  FastRecovery = 'fast-recovery',
}

// =============================================================================
// Core Interfaces
// =============================================================================

/**
 * Transport-level address: a network host plus a port on it.
 */
export interface Endpoint {
  /** Network address of the host (routing key for the channel) */
  address: string;

  /** Port number (1-65535) */
  port: number;
}

/**
 * Opaque identifier for a connection handed to applications.
 */
export type ConnectionHandle = string;

/**
 * Counters kept by every connection.
 */
export interface ConnectionStats {
  /** Segments handed to the channel (including retransmissions and pure ACKs) */
  segmentsSent: number;

  /** Segments carrying payload sent for the first time */
  dataSegmentsSent: number;

  /** Segments accepted from the channel */
  segmentsReceived: number;

  /** Payload bytes sent for the first time */
  bytesSent: number;

  /** Payload bytes acknowledged by the peer */
  bytesAcked: number;

  /** Payload bytes delivered in order to the local application */
  bytesDelivered: number;

  /** Retransmitted segments (timeouts plus fast retransmits) */
  retransmissions: number;

  /** Retransmission timer expiries */
  timeouts: number;

  /** Fast retransmits triggered by duplicate ACKs */
  fastRetransmits: number;

  /** Duplicate ACKs received */
  duplicateAcks: number;

  /** Datagrams queued because the channel refused them */
  sendRetries: number;
}

/**
 * Snapshot of a connection's transmission control block.
 */
export interface ConnectionInfo {
  handle: ConnectionHandle;
  local: Endpoint;
  remote: Endpoint;
  state: ConnectionState;

  /** Oldest unacknowledged sequence number */
  sendBase: number;

  /** Next sequence number to send */
  sendNext: number;

  /** Next sequence number expected from the peer */
  receiveNext: number;

  congestionWindow: number;
  slowStartThreshold: number;
  congestionPhase: CongestionPhase;

  /** Window most recently advertised by the peer */
  peerWindow: number;

  /** Window we currently advertise */
  receiveWindow: number;

  /** Smoothed round-trip time in ms (undefined before the first sample) */
  smoothedRtt?: number;

  /** Round-trip time variance in ms (undefined before the first sample) */
  rttVariance?: number;

  /** Current retransmission timeout in ms */
  retransmissionTimeout: number;

  stats: ConnectionStats;
}

// =============================================================================
// Configuration Types
// =============================================================================

/**
 * Transport engine configuration. All durations are in milliseconds,
 * all sizes in bytes.
 */
export interface TransportConfig {
  /** Retransmission timeout before any round-trip sample exists */
  initialTimeout: number;

  /** Lower clamp for the computed retransmission timeout */
  minTimeout: number;

  /** Upper clamp for the computed and backed-off retransmission timeout */
  maxTimeout: number;

  /** Maximum payload carried by a single segment */
  mss: number;

  /** Congestion window at connection start */
  initialCongestionWindow: number;

  /** Slow-start threshold at connection start */
  initialSlowStartThreshold: number;

  /** Receive buffer size, and the largest window we advertise */
  maxReceiveWindow: number;

  /** Time spent in TIME_WAIT before the connection is destroyed */
  timeWaitDuration: number;

  /** Consecutive duplicate ACKs that trigger a fast retransmit */
  duplicateAckThreshold: number;

  /** Handshake retransmissions before the open fails */
  maxSynRetries: number;

  /** First delay before retrying a datagram the channel refused */
  sendRetryDelay: number;

  /** Cap for the exponentially growing channel retry delay */
  maxSendRetryDelay: number;
}

/**
 * Partial configuration accepted by constructors; missing fields take defaults.
 */
export type PartialTransportConfig = Partial<TransportConfig>;

// =============================================================================
// Error Types
// =============================================================================

/**
 * Base error class for transport engine errors.
 */
export class TransportError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'TransportError';
  }
}

/**
 * Error thrown when bytes cannot be parsed as a segment.
 */
export class MalformedError extends TransportError {
  constructor(message: string) {
    super(message);
    this.name = 'MalformedError';
  }
}

/**
 * Error thrown when a segment's checksum does not match its contents.
 */
export class ChecksumError extends TransportError {
  /** Checksum carried by the segment */
  readonly received: number;

  /** Checksum recomputed over the received bytes */
  readonly computed: number;

  constructor(message: string, received: number, computed: number) {
    super(message);
    this.name = 'ChecksumError';
    this.received = received;
    this.computed = computed;
  }
}

/**
 * Error raised when a connection cannot be established.
 */
export class ConnectError extends TransportError {
  /** The endpoint we tried to reach */
  readonly remote: Endpoint;

  constructor(message: string, remote: Endpoint) {
    super(message);
    this.name = 'ConnectError';
    this.remote = remote;
  }
}

/**
 * Error returned by a channel that temporarily refuses a datagram.
 */
export class TransientFailure extends TransportError {
  constructor(message: string) {
    super(message);
    this.name = 'TransientFailure';
  }
}

/**
 * Error raised when a connection is torn down abruptly.
 */
export class ConnectionReset extends TransportError {
  /** Whether the reset was requested locally (abort) rather than by the peer */
  readonly local: boolean;

  constructor(message: string, local: boolean) {
    super(message);
    this.name = 'ConnectionReset';
    this.local = local;
  }
}

/**
 * Error thrown when an operation is not allowed in the connection's state.
 */
export class InvalidStateError extends TransportError {
  readonly state: ConnectionState;

  constructor(message: string, state: ConnectionState) {
    super(message);
    this.name = 'InvalidStateError';
    this.state = state;
  }
}

/**
 * Error thrown when a configuration value is out of range.
 */
export class ConfigError extends TransportError {
  /** Name of the offending option */
  readonly option: string;

  constructor(message: string, option: string) {
    super(message);
    this.name = 'ConfigError';
    this.option = option;
  }
}

// =============================================================================
// Utility Functions
// =============================================================================

/**
 * Formats an endpoint as `address:port`.
 */
export function formatEndpoint(endpoint: Endpoint): string {
  return `${endpoint.address}:${endpoint.port}`;
}

/**
 * Builds the handle identifying a connection between two endpoints.
 */
export function connectionKey(local: Endpoint, remote: Endpoint): ConnectionHandle {
  return `${formatEndpoint(local)}>${formatEndpoint(remote)}`;
}

/**
 * Creates a zeroed statistics record.
 */
export function createConnectionStats(): ConnectionStats {
  return {
    segmentsSent: 0,
    dataSegmentsSent: 0,
    segmentsReceived: 0,
    bytesSent: 0,
    bytesAcked: 0,
    bytesDelivered: 0,
    retransmissions: 0,
    timeouts: 0,
    fastRetransmits: 0,
    duplicateAcks: 0,
    sendRetries: 0,
  };
}
