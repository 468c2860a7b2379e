/**
 * Channel module - datagram contract and the simulated network.
 *
 * @module engine/channel
 */

export type { Channel, DatagramSender, IncomingDatagram, SendResult } from './types.js';
export {
  SimulatedNetwork,
  IDEAL_CONDITIONS,
  type NetworkConditions,
  type NetworkMetrics,
  type DropPredicate,
  type SimulatedNetworkOptions,
  type SimulatedNetworkEvents,
} from './simulated.js';
