/**
 * Connection module - the per-connection protocol state machine.
 *
 * @module engine/connection
 */

export {
  Connection,
  type ConnectionEvents,
  type ConnectionOptions,
  type RetransmitReason,
} from './connection.js';
