/**
 * Congestion control module.
 *
 * @module engine/congestion
 */

export {
  CongestionController,
  type CongestionControllerOptions,
  type CongestionControllerEvents,
  type DuplicateAckAction,
  type WindowChangeReason,
} from './controller.js';
