/**
 * Send module - unacknowledged byte store and sliding window.
 *
 * @module engine/send
 */

export {
  SendBuffer,
  type SendBufferOptions,
  type WindowSource,
  type OutgoingData,
  type AckKind,
  type AckResult,
} from './buffer.js';
