/**
 * One-way bulk transfer scenario.
 *
 * Opens a connection from a client host to a listening server host, writes
 * a payload, closes both directions and runs the simulation until both
 * connections are gone. The report compares what arrived with what was
 * sent and collects the counters needed to judge the run.
 *
 * @module engine/simulation/transfer
 */

import type { NetworkMetrics, SimulatedNetworkOptions } from '../channel/simulated.js';
import type { WindowChangeReason } from '../congestion/controller.js';
import type { StackStats, TransportStack } from '../stack/stack.js';
import {
  ConnectionState,
  type CongestionPhase,
  type ConnectionHandle,
  type ConnectionInfo,
  type PartialTransportConfig,
} from '../types.js';
import { createRandom, randomBytes } from '../utils/random.js';
import { Simulator, type StopReason } from './simulator.js';

// =============================================================================
// Types
// =============================================================================

/**
 * Options for {@link runTransfer}.
 */
export interface TransferOptions {
  /** Payload size in bytes when no payload is given (default: 100000) */
  bytes?: number;

  payload?: Buffer;
  network?: SimulatedNetworkOptions;
  config?: PartialTransportConfig;

  /** Seed for the payload, the network and both hosts (default: 1) */
  seed?: number;

  /** Simulated time limit in ms (default: 10 minutes) */
  maxTime?: number;

  /** Called once both hosts exist, before anything is sent */
  observe?: (context: TransferContext) => void;
}

/**
 * What {@link TransferOptions.observe} receives.
 */
export interface TransferContext {
  simulator: Simulator;
  client: TransportStack;
  server: TransportStack;
}

/**
 * One congestion window change on the sending side.
 */
export interface WindowSample {
  time: number;
  reason: WindowChangeReason;
  phase: CongestionPhase;
  window: number;
  threshold: number;
}

/**
 * Outcome of a transfer.
 */
export interface TransferReport {
  bytesWritten: number;
  bytesDelivered: number;

  /** Delivered bytes equal the written bytes, in order */
  intact: boolean;

  /** Both connections closed gracefully */
  completed: boolean;

  stopReason: StopReason;

  /** Time at which the last byte reached the server application (ms) */
  duration: number;

  /** Time at which both connections were gone (ms) */
  finishedAt: number;

  /** Delivered bytes per second of simulated time */
  goodput: number;

  client: ConnectionInfo;
  server: ConnectionInfo | null;

  windowTrace: WindowSample[];
  network: NetworkMetrics;
  stacks: { client: StackStats; server: StackStats };

  /** Message of the error that ended the client connection, if any */
  error?: string;
}

const CLIENT_ADDRESS = '10.0.0.1';
const SERVER_ADDRESS = '10.0.0.2';
const SERVER_PORT = 80;
const DEFAULT_BYTES = 100_000;
const DEFAULT_MAX_TIME = 10 * 60 * 1000;

// =============================================================================
// Scenario
// =============================================================================

/**
 * Run a complete client-to-server transfer.
 *
 * @example
 * ```typescript
 * const report = runTransfer({
 *   bytes: 10_000,
 *   config: { mss: 500, initialCongestionWindow: 500 },
 *   network: { lossRate: 0.02, latency: 20 },
 * });
 * console.log(report.intact, report.client.stats.retransmissions);
 * ```
 */
export function runTransfer(options: TransferOptions = {}): TransferReport {
  const seed = options.seed ?? 1;
  const payload = options.payload ?? randomBytes(createRandom(seed), options.bytes ?? DEFAULT_BYTES);

  const simulator = new Simulator({ network: options.network, seed });
  const client = simulator.addHost(CLIENT_ADDRESS, options.config);
  const server = simulator.addHost(SERVER_ADDRESS, options.config);
  options.observe?.({ simulator, client, server });

  const received: Buffer[] = [];
  const windowTrace: WindowSample[] = [];
  let serverHandle: ConnectionHandle | undefined;
  let deliveredAt = 0;
  let clientClean = false;
  let serverClean = false;
  let error: string | undefined;

  const collect = (handle: ConnectionHandle): void => {
    for (const chunk of server.read(handle, simulator.now)) {
      received.push(chunk);
      deliveredAt = simulator.now;
    }
  };

  server.listen(SERVER_PORT);
  server.on('connection:incoming', () => {
    serverHandle = server.accept();
  });
  server.on('connection:data', ({ handle }) => collect(handle));
  server.on('connection:end', ({ handle }) => {
    collect(handle);
    server.close(handle, simulator.now);
  });
  server.on('connection:closed', ({ handle, reset }) => {
    serverClean = handle === serverHandle && !reset;
  });

  client.on('congestion:window', ({ now, reason, phase, window, threshold }) => {
    windowTrace.push({ time: now, reason, phase, window, threshold });
  });
  client.on('connection:failed', ({ error: failure }) => {
    error = failure.message;
  });
  client.on('connection:closed', ({ reset }) => {
    clientClean = !reset;
  });

  const handle = client.open({ address: SERVER_ADDRESS, port: SERVER_PORT }, simulator.now);
  client.write(handle, payload, simulator.now);
  client.close(handle, simulator.now);

  const result = simulator.run({
    until: () => client.activeConnections === 0 && server.activeConnections === 0,
    maxTime: options.maxTime ?? DEFAULT_MAX_TIME,
  });

  const delivered = Buffer.concat(received);
  const clientInfo = client.getInfo(handle);
  const serverInfo = serverHandle === undefined ? null : server.getInfo(serverHandle);

  return {
    bytesWritten: payload.length,
    bytesDelivered: delivered.length,
    intact: delivered.equals(payload),
    completed:
      clientClean &&
      serverClean &&
      clientInfo.state === ConnectionState.Closed &&
      serverInfo?.state === ConnectionState.Closed,
    stopReason: result.reason,
    duration: deliveredAt,
    finishedAt: result.now,
    goodput: deliveredAt > 0 ? Math.round((delivered.length * 1000) / deliveredAt) : 0,
    client: clientInfo,
    server: serverInfo,
    windowTrace,
    network: { ...simulator.network.metrics },
    stacks: { client: { ...client.stats }, server: { ...server.stats } },
    error,
  };
}
