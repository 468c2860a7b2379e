/**
 * Timer module - explicit timer queue, RTT estimation and retransmission timer.
 *
 * @module engine/timer
 */

export { TimerQueue } from './queue.js';
export { RttEstimator, type RttParameters } from './rtt.js';
export {
  RetransmissionTimer,
  type RetransmissionTimerOptions,
  type ConnectionTimer,
} from './retransmission.js';
