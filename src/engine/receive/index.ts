/**
 * Receive module - reordering buffer and advertised window.
 *
 * @module engine/receive
 */

export { ReceiveBuffer, type ReceiveBufferOptions, type ReceiveResult } from './buffer.js';
