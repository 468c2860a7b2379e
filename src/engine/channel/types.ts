/**
 * Channel contract.
 *
 * A channel moves opaque datagrams between hosts identified by address. It
 * may lose, duplicate, reorder or corrupt them; it may also refuse a send
 * for now, which the caller treats as back-pressure and retries.
 *
 * @module engine/channel/types
 */

import type { TransientFailure } from '../types.js';

/**
 * Outcome of a send attempt.
 */
export type SendResult = { ok: true } | { ok: false; error: TransientFailure };

/**
 * A datagram taken off the channel.
 */
export interface IncomingDatagram {
  datagram: Buffer;

  /** Address of the sending host */
  from: string;
}

/**
 * Datagram transport shared by every connection of one host.
 */
export interface Channel {
  /** Address of the host this channel belongs to */
  readonly address: string;

  /**
   * Hand a datagram to the channel. Never throws for refusals; returns a
   * TransientFailure instead.
   */
  send(datagram: Buffer, to: string): SendResult;

  /**
   * Datagrams that have arrived by `now`, oldest arrival first.
   */
  receive(now: number): Iterable<IncomingDatagram>;
}

/**
 * The sending half of a channel, all a connection needs.
 */
export type DatagramSender = Pick<Channel, 'send'>;
