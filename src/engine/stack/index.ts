/**
 * Stack module - the per-host application interface.
 *
 * @module engine/stack
 */

export {
  TransportStack,
  type TransportStackEvents,
  type TransportStackOptions,
  type StackStats,
  type DropReason,
} from './stack.js';
