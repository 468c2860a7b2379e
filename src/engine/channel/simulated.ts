/**
 * Simulated Network
 *
 * An in-process, deterministic datagram network for tests and the CLI. Every
 * host attaches a {@link Channel}; datagrams sent through it are scheduled
 * for delivery on a virtual clock after a latency (plus optional jitter) and
 * may be lost, duplicated, held back (reordered) or have a bit flipped on
 * the way. A per-host queue capacity and a refusal rate model back-pressure.
 *
 * All randomness comes from a seeded generator, so a run replays exactly.
 *
 * @module engine/channel/simulated
 */

import { TypedEventEmitter } from '../events.js';
import { TransientFailure } from '../types.js';
import { createRandom, randomInt, type RandomSource } from '../utils/random.js';
import type { Channel, IncomingDatagram, SendResult } from './types.js';

// =============================================================================
// Types
// =============================================================================

/**
 * Impairments applied to every datagram. Rates are probabilities in [0, 1],
 * durations in ms.
 */
export interface NetworkConditions {
  lossRate: number;
  duplicateRate: number;

  /** Probability that a datagram is held back by {@link reorderDelay} */
  reorderRate: number;
  reorderDelay: number;

  /** Probability that one bit of a datagram is flipped */
  corruptRate: number;

  /** Probability that a send is refused with a TransientFailure */
  refuseRate: number;

  /** One-way delay */
  latency: number;

  /** Extra delay drawn uniformly from [0, jitter) */
  jitter: number;

  /** Undelivered datagrams allowed per sending host before sends are refused (0 = unlimited) */
  queueCapacity: number;
}

/**
 * Decides whether a particular datagram is lost, on top of the random loss.
 */
export type DropPredicate = (datagram: Buffer, from: string, to: string) => boolean;

/**
 * Options for creating a simulated network.
 */
export interface SimulatedNetworkOptions extends Partial<NetworkConditions> {
  /** Seed for every random decision (default: 1) */
  seed?: number;

  drop?: DropPredicate;
}

/**
 * Counters kept by the network.
 */
export interface NetworkMetrics {
  /** Datagrams accepted by send() */
  sent: number;
  delivered: number;
  lost: number;
  duplicated: number;
  reordered: number;
  corrupted: number;

  /** Sends refused with a TransientFailure */
  refused: number;

  /** Datagrams addressed to a host nobody attached */
  unroutable: number;
}

/**
 * Events emitted by the SimulatedNetwork.
 */
export interface SimulatedNetworkEvents {
  send: {
    from: string;
    to: string;
    size: number;
    now: number;
    outcome: 'queued' | 'lost' | 'refused' | 'unroutable';
    duplicated: boolean;
    corrupted: boolean;
    reordered: boolean;
  };
  deliver: {
    from: string;
    to: string;
    size: number;
    now: number;
  };
}

interface InTransit {
  from: string;
  to: string;
  datagram: Buffer;
  deliverAt: number;
  order: number;
}

/**
 * Conditions of a perfect network.
 */
export const IDEAL_CONDITIONS: NetworkConditions = {
  lossRate: 0,
  duplicateRate: 0,
  reorderRate: 0,
  reorderDelay: 0,
  corruptRate: 0,
  refuseRate: 0,
  latency: 10,
  jitter: 0,
  queueCapacity: 0,
};

// =============================================================================
// SimulatedChannel
// =============================================================================

/**
 * A host's view of the network.
 */
class SimulatedChannel implements Channel {
  constructor(
    readonly address: string,
    private readonly network: SimulatedNetwork
  ) {}

  send(datagram: Buffer, to: string): SendResult {
    return this.network.transmit(this.address, to, datagram);
  }

  receive(now: number): Iterable<IncomingDatagram> {
    return this.network.collect(this.address, now);
  }
}

// =============================================================================
// SimulatedNetwork Class
// =============================================================================

/**
 * Deterministic lossy network on a virtual clock.
 *
 * @example
 * ```typescript
 * const network = new SimulatedNetwork({ lossRate: 0.1, latency: 20, seed: 7 });
 * const a = network.attach('10.0.0.1');
 * const b = network.attach('10.0.0.2');
 *
 * a.send(datagram, '10.0.0.2');
 * network.advanceTo(20);
 * for (const { datagram, from } of b.receive(20)) {
 *   // ...
 * }
 * ```
 */
export class SimulatedNetwork extends TypedEventEmitter<SimulatedNetworkEvents> {
  public readonly metrics: NetworkMetrics = {
    sent: 0,
    delivered: 0,
    lost: 0,
    duplicated: 0,
    reordered: 0,
    corrupted: 0,
    refused: 0,
    unroutable: 0,
  };

  private conditions_: NetworkConditions;
  private readonly random: RandomSource;
  private readonly drop: DropPredicate | undefined;
  private readonly channels: Map<string, SimulatedChannel> = new Map();
  private queue: InTransit[] = [];
  private counter = 0;
  private clock = 0;

  constructor(options: SimulatedNetworkOptions = {}) {
    super();
    const { seed, drop, ...conditions } = options;
    this.conditions_ = normalizeConditions(IDEAL_CONDITIONS, conditions);
    this.random = createRandom(seed ?? 1);
    this.drop = drop;
  }

  // ===========================================================================
  // Getters
  // ===========================================================================

  get now(): number {
    return this.clock;
  }

  get conditions(): Readonly<NetworkConditions> {
    return this.conditions_;
  }

  /** Datagrams scheduled but not yet delivered */
  get inFlight(): number {
    return this.queue.length;
  }

  // ===========================================================================
  // Public Methods
  // ===========================================================================

  /**
   * Attach a host and return its channel.
   *
   * @throws Error if the address is already attached
   */
  attach(address: string): Channel {
    if (this.channels.has(address)) {
      throw new Error(`Address already attached: ${address}`);
    }
    const channel = new SimulatedChannel(address, this);
    this.channels.set(address, channel);
    return channel;
  }

  /**
   * Change impairments mid-run.
   */
  setConditions(conditions: Partial<NetworkConditions>): void {
    this.conditions_ = normalizeConditions(this.conditions_, conditions);
  }

  /**
   * Move the virtual clock forward. Sends use it as their departure time.
   */
  advanceTo(now: number): void {
    if (now > this.clock) {
      this.clock = now;
    }
  }

  /**
   * Earliest scheduled delivery, or undefined when nothing is in transit.
   */
  nextDeliveryTime(): number | undefined {
    let earliest: number | undefined;
    for (const entry of this.queue) {
      if (earliest === undefined || entry.deliverAt < earliest) {
        earliest = entry.deliverAt;
      }
    }
    return earliest;
  }

  // ===========================================================================
  // Channel Plumbing
  // ===========================================================================

  /** @internal */
  transmit(from: string, to: string, datagram: Buffer): SendResult {
    const c = this.conditions_;
    const base = { from, to, size: datagram.length, now: this.clock };
    const flags = { duplicated: false, corrupted: false, reordered: false };

    if (this.chance(c.refuseRate) || this.queueFull(from)) {
      this.metrics.refused++;
      this.emit('send', { ...base, ...flags, outcome: 'refused' });
      return { ok: false, error: new TransientFailure(`Outbound queue of ${from} is full`) };
    }

    this.metrics.sent++;

    if (!this.channels.has(to)) {
      this.metrics.unroutable++;
      this.emit('send', { ...base, ...flags, outcome: 'unroutable' });
      return { ok: true };
    }

    if (this.chance(c.lossRate) || (this.drop !== undefined && this.drop(datagram, from, to))) {
      this.metrics.lost++;
      this.emit('send', { ...base, ...flags, outcome: 'lost' });
      return { ok: true };
    }

    flags.corrupted = this.chance(c.corruptRate);
    flags.reordered = this.chance(c.reorderRate);
    flags.duplicated = this.chance(c.duplicateRate);

    const copy = flags.corrupted ? this.flipBit(datagram) : Buffer.from(datagram);
    if (flags.corrupted) this.metrics.corrupted++;
    if (flags.reordered) this.metrics.reordered++;

    this.schedule(from, to, copy, flags.reordered);
    if (flags.duplicated) {
      this.metrics.duplicated++;
      this.schedule(from, to, Buffer.from(copy), false);
    }

    this.emit('send', { ...base, ...flags, outcome: 'queued' });
    return { ok: true };
  }

  /** @internal */
  *collect(address: string, now: number): Generator<IncomingDatagram, void, undefined> {
    for (;;) {
      let index = -1;
      for (let i = 0; i < this.queue.length; i++) {
        const entry = this.queue[i];
        if (entry.to !== address || entry.deliverAt > now) continue;
        const best = index >= 0 ? this.queue[index] : undefined;
        if (
          best === undefined ||
          entry.deliverAt < best.deliverAt ||
          (entry.deliverAt === best.deliverAt && entry.order < best.order)
        ) {
          index = i;
        }
      }
      if (index < 0) {
        return;
      }

      const [entry] = this.queue.splice(index, 1);
      this.metrics.delivered++;
      this.emit('deliver', { from: entry.from, to: entry.to, size: entry.datagram.length, now });
      yield { datagram: entry.datagram, from: entry.from };
    }
  }

  // ===========================================================================
  // Private Methods
  // ===========================================================================

  private chance(rate: number): boolean {
    return rate > 0 && this.random() < rate;
  }

  private queueFull(from: string): boolean {
    const capacity = this.conditions_.queueCapacity;
    if (capacity <= 0) {
      return false;
    }
    let queued = 0;
    for (const entry of this.queue) {
      if (entry.from === from) queued++;
    }
    return queued >= capacity;
  }

  private schedule(from: string, to: string, datagram: Buffer, held: boolean): void {
    const c = this.conditions_;
    const jitter = c.jitter > 0 ? this.random() * c.jitter : 0;
    const deliverAt = this.clock + c.latency + jitter + (held ? c.reorderDelay : 0);
    this.queue.push({ from, to, datagram, deliverAt, order: this.counter++ });
  }

  private flipBit(datagram: Buffer): Buffer {
    const copy = Buffer.from(datagram);
    if (copy.length === 0) {
      return copy;
    }
    const bit = randomInt(this.random, copy.length * 8);
    copy[bit >> 3] ^= 1 << (bit & 7);
    return copy;
  }
}

// =============================================================================
// Helper Functions
// =============================================================================

function clampRate(rate: number): number {
  return Number.isFinite(rate) ? Math.max(0, Math.min(1, rate)) : 0;
}

function clampDuration(value: number): number {
  return Number.isFinite(value) ? Math.max(0, value) : 0;
}

/**
 * Apply overrides to a base set of conditions, ignoring undefined values and
 * clamping everything into range.
 */
function normalizeConditions(
  base: NetworkConditions,
  overrides: Partial<NetworkConditions>
): NetworkConditions {
  return {
    lossRate: clampRate(overrides.lossRate ?? base.lossRate),
    duplicateRate: clampRate(overrides.duplicateRate ?? base.duplicateRate),
    reorderRate: clampRate(overrides.reorderRate ?? base.reorderRate),
    reorderDelay: clampDuration(overrides.reorderDelay ?? base.reorderDelay),
    corruptRate: clampRate(overrides.corruptRate ?? base.corruptRate),
    refuseRate: clampRate(overrides.refuseRate ?? base.refuseRate),
    latency: clampDuration(overrides.latency ?? base.latency),
    jitter: clampDuration(overrides.jitter ?? base.jitter),
    queueCapacity: Math.floor(clampDuration(overrides.queueCapacity ?? base.queueCapacity)),
  };
}
