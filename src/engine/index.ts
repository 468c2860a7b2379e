/**
 * Reliable Transport Engine
 *
 * This module exports a TCP-like reliable byte stream running over an
 * unreliable datagram channel, together with the simulated network and the
 * scenario runner used to exercise it.
 *
 * @module engine
 */

export { VERSION as engineVersion } from '../shared/constants.js';

// Type definitions (canonical source for all shared types and errors)
export * from './types.js';

// Event system
export { TypedEventEmitter, type EventListener } from './events.js';

// Configuration
export * from './config/index.js';

// Protocol building blocks
export * from './segment/index.js';
export * from './timer/index.js';
export * from './congestion/index.js';
export * from './send/index.js';
export * from './receive/index.js';
export * from './connection/index.js';

// Hosts, channels and simulation
export * from './channel/index.js';
export * from './stack/index.js';
export * from './simulation/index.js';
export {
  createRandom,
  randomInt,
  randomSequence,
  randomBytes,
  type RandomSource,
} from './utils/random.js';
