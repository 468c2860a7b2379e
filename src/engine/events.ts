/**
 * Typed Event Emitter for the transport engine
 *
 * Provides type-safe event emission and subscription for connections, the
 * congestion controller, the transport stack and the network simulator.
 * Wraps Node's EventEmitter with full TypeScript type safety.
 *
 * @module engine/events
 */

import { EventEmitter } from 'events';

// ============================================================================
// Listener Types
// ============================================================================

/**
 * Listener signature for an event: payload-less events take no argument.
 */
export type EventListener<T, K extends keyof T> = T[K] extends void
  ? () => void
  : (payload: T[K]) => void;

// ============================================================================
// TypedEventEmitter Implementation
// ============================================================================

/**
 * Type-safe event emitter that wraps Node's EventEmitter
 *
 * @template T - Event map type defining event names and their payload types
 *
 * @example
 * ```typescript
 * interface ConnectionEvents {
 *   established: void;
 *   data: { bytes: number };
 * }
 *
 * const emitter = new TypedEventEmitter<ConnectionEvents>();
 * emitter.on('data', ({ bytes }) => {
 *   console.log(`${bytes} bytes ready`);
 * });
 *
 * emitter.emit('data', { bytes: 512 });
 * emitter.emit('established');
 * ```
 */
export class TypedEventEmitter<T extends { [K in keyof T]: unknown }> {
  private emitter: EventEmitter;

  constructor() {
    this.emitter = new EventEmitter();
  }

  /**
   * Subscribe to an event
   *
   * @returns this for chaining
   */
  on<K extends keyof T>(event: K, listener: EventListener<T, K>): this {
    this.emitter.on(event as string, listener as (...args: unknown[]) => void);
    return this;
  }

  /**
   * Subscribe to an event once (auto-unsubscribes after first emission)
   *
   * @returns this for chaining
   */
  once<K extends keyof T>(event: K, listener: EventListener<T, K>): this {
    this.emitter.once(event as string, listener as (...args: unknown[]) => void);
    return this;
  }

  /**
   * Unsubscribe from an event
   *
   * @returns this for chaining
   */
  off<K extends keyof T>(event: K, listener: EventListener<T, K>): this {
    this.emitter.off(event as string, listener as (...args: unknown[]) => void);
    return this;
  }

  /**
   * Emit an event with payload
   *
   * @param event - The event name
   * @param args - The event payload (omit for void events)
   * @returns true if event had listeners, false otherwise
   */
  emit<K extends keyof T>(
    event: K,
    ...args: T[K] extends void ? [] : [payload: T[K]]
  ): boolean {
    return this.emitter.emit(event as string, ...args);
  }

  /**
   * Remove all listeners for a specific event or all events
   *
   * @param event - Optional event name. If omitted, removes all listeners for all events.
   * @returns this for chaining
   */
  removeAllListeners<K extends keyof T>(event?: K): this {
    if (event !== undefined) {
      this.emitter.removeAllListeners(event as string);
    } else {
      this.emitter.removeAllListeners();
    }
    return this;
  }
}
