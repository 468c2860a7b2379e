/**
 * Discrete-event simulator.
 *
 * Drives a {@link SimulatedNetwork} and the transport stacks attached to it
 * on one virtual clock. Each step jumps to the earliest pending event (a
 * datagram delivery or a connection timer) and polls every stack at that
 * instant, so simulated hours cost no wall-clock time.
 *
 * @module engine/simulation/simulator
 */

import { SimulatedNetwork, type SimulatedNetworkOptions } from '../channel/simulated.js';
import { TransportStack } from '../stack/stack.js';
import type { PartialTransportConfig } from '../types.js';
import { createRandom } from '../utils/random.js';

/**
 * Options for creating a simulator.
 */
export interface SimulatorOptions {
  network?: SimulatedNetworkOptions;

  /** Seed for the network and the hosts' sequence numbers (default: 1) */
  seed?: number;
}

/**
 * Limits for {@link Simulator.run}.
 */
export interface RunOptions {
  /** Stop as soon as this returns true (checked after every step) */
  until?: () => boolean;

  /** Do not advance the clock past this time */
  maxTime?: number;

  maxSteps?: number;
}

/**
 * Why {@link Simulator.run} returned.
 */
export type StopReason = 'condition' | 'idle' | 'time-limit' | 'step-limit';

export interface RunResult {
  reason: StopReason;
  now: number;
  steps: number;
}

const DEFAULT_MAX_STEPS = 10_000_000;

/**
 * Virtual-time scheduler for a set of hosts.
 *
 * @example
 * ```typescript
 * const sim = new Simulator({ network: { lossRate: 0.05, latency: 25 }, seed: 42 });
 * const client = sim.addHost('10.0.0.1');
 * const server = sim.addHost('10.0.0.2');
 *
 * server.listen(80);
 * const handle = client.open({ address: '10.0.0.2', port: 80 }, sim.now);
 * sim.run({ until: () => client.getState(handle) === ConnectionState.Established });
 * ```
 */
export class Simulator {
  readonly network: SimulatedNetwork;

  private readonly hosts: TransportStack[] = [];
  private readonly seed: number;
  private clock = 0;

  constructor(options: SimulatorOptions = {}) {
    this.seed = options.seed ?? 1;
    this.network = new SimulatedNetwork({ ...options.network, seed: options.network?.seed ?? this.seed });
  }

  /** Current virtual time in ms */
  get now(): number {
    return this.clock;
  }

  /**
   * Attach a host to the network and return its transport stack.
   */
  addHost(address: string, config?: PartialTransportConfig): TransportStack {
    const stack = new TransportStack({
      channel: this.network.attach(address),
      config,
      random: createRandom(this.seed + this.hosts.length + 1),
    });
    this.hosts.push(stack);
    return stack;
  }

  /**
   * Earliest pending delivery or timer, if any.
   */
  nextEventTime(): number | undefined {
    let next = this.network.nextDeliveryTime();
    for (const host of this.hosts) {
      const deadline = host.nextDeadline();
      if (deadline !== undefined && (next === undefined || deadline < next)) {
        next = deadline;
      }
    }
    return next;
  }

  /**
   * Advance to the next event and process it.
   *
   * @returns false when nothing is pending
   */
  step(): boolean {
    const next = this.nextEventTime();
    if (next === undefined) {
      return false;
    }
    this.advance(Math.max(this.clock, next));
    return true;
  }

  /**
   * Step until the condition holds, nothing is pending or a limit is hit.
   */
  run(options: RunOptions = {}): RunResult {
    const maxTime = options.maxTime ?? Infinity;
    const maxSteps = options.maxSteps ?? DEFAULT_MAX_STEPS;
    let steps = 0;

    for (;;) {
      if (options.until?.()) {
        return { reason: 'condition', now: this.clock, steps };
      }
      if (steps >= maxSteps) {
        return { reason: 'step-limit', now: this.clock, steps };
      }
      const next = this.nextEventTime();
      if (next === undefined) {
        return { reason: 'idle', now: this.clock, steps };
      }
      if (next > maxTime) {
        this.advance(Math.max(this.clock, maxTime));
        return { reason: 'time-limit', now: this.clock, steps };
      }
      this.advance(Math.max(this.clock, next));
      steps++;
    }
  }

  /**
   * Process everything up to `now + duration`.
   */
  runFor(duration: number): RunResult {
    return this.run({ maxTime: this.clock + duration });
  }

  private advance(now: number): void {
    this.clock = now;
    this.network.advanceTo(now);
    for (const host of this.hosts) {
      host.poll(now);
    }
  }
}
