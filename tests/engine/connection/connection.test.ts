import { describe, it, expect, beforeEach, vi } from 'vitest';
import { Connection } from '../../../src/engine/connection/connection.js';
import type { DatagramSender, SendResult } from '../../../src/engine/channel/types.js';
import { resolveConfig } from '../../../src/engine/config/defaults.js';
import {
  SegmentFlag,
  createSegment,
  decodeSegment,
  type Segment,
  type SegmentFields,
} from '../../../src/engine/segment/codec.js';
import {
  ConnectError,
  ConnectionReset,
  ConnectionState,
  InvalidStateError,
  TransientFailure,
  type PartialTransportConfig,
} from '../../../src/engine/types.js';

const { SYN, ACK, FIN, RST, PSH } = SegmentFlag;

/** Records every datagram as a decoded segment; can refuse a number of sends */
class RecordingChannel implements DatagramSender {
  sent: Segment[] = [];
  refuse = 0;

  send(datagram: Buffer): SendResult {
    if (this.refuse > 0) {
      this.refuse--;
      return { ok: false, error: new TransientFailure('queue full') };
    }
    this.sent.push(decodeSegment(datagram));
    return { ok: true };
  }

  take(): Segment[] {
    const sent = this.sent;
    this.sent = [];
    return sent;
  }
}

/** A segment from the peer (port 80) to the connection under test (port 1000) */
function fromPeer(fields: Partial<SegmentFields> & Pick<SegmentFields, 'seq' | 'flags'>): Segment {
  return createSegment({ sourcePort: 80, destinationPort: 1000, ack: 0, window: 65535, ...fields });
}

describe('Connection', () => {
  let channel: RecordingChannel;

  function createConnection(config: PartialTransportConfig = {}): Connection {
    return new Connection({
      local: { address: '10.0.0.1', port: 1000 },
      remote: { address: '10.0.0.2', port: 80 },
      initialSequence: 100,
      channel,
      config: resolveConfig({ mss: 100, initialCongestionWindow: 100, ...config }),
    });
  }

  /** Active open completed at t=20 with the peer's ISS 500 */
  function established(config: PartialTransportConfig = {}, peerWindow = 65535): Connection {
    const connection = createConnection(config);
    connection.open(0);
    connection.handleSegment(fromPeer({ seq: 500, ack: 101, flags: SYN | ACK, window: peerWindow }), 20);
    channel.take();
    return connection;
  }

  beforeEach(() => {
    channel = new RecordingChannel();
  });

  describe('active open', () => {
    it('should send a SYN and arm the handshake timer', () => {
      const connection = createConnection();
      connection.open(0);

      const [syn] = channel.take();
      expect(syn).toMatchObject({ sourcePort: 1000, destinationPort: 80, seq: 100, flags: SYN });
      expect(connection.state).toBe(ConnectionState.SynSent);
      expect(connection.nextDeadline()).toBe(1000);
    });

    it('should complete on SYN+ACK and acknowledge it', () => {
      const connection = createConnection();
      const onEstablished = vi.fn();
      connection.on('established', onEstablished);
      connection.open(0);
      channel.take();

      connection.handleSegment(fromPeer({ seq: 500, ack: 101, flags: SYN | ACK }), 20);

      expect(channel.take()).toEqual([expect.objectContaining({ seq: 101, ack: 501, flags: ACK })]);
      expect(connection.state).toBe(ConnectionState.Established);
      expect(onEstablished).toHaveBeenCalledWith({ now: 20 });

      const info = connection.info();
      expect(info.sendBase).toBe(101);
      expect(info.receiveNext).toBe(501);
      expect(info.smoothedRtt).toBe(20);
      expect(info.retransmissionTimeout).toBe(200);
      expect(connection.nextDeadline()).toBeUndefined();
    });

    it('should answer a SYN+ACK for the wrong sequence with RST', () => {
      const connection = createConnection();
      connection.open(0);
      channel.take();

      connection.handleSegment(fromPeer({ seq: 500, ack: 999, flags: SYN | ACK }), 20);

      expect(channel.take()).toEqual([expect.objectContaining({ seq: 999, flags: RST })]);
      expect(connection.state).toBe(ConnectionState.SynSent);
    });

    it('should retransmit the SYN with backoff and give up after the retry limit', () => {
      const connection = createConnection({ maxSynRetries: 2 });
      const onFailed = vi.fn();
      connection.on('failed', onFailed);
      connection.open(0);
      channel.take();

      connection.onTimer(1000);
      expect(channel.take()).toEqual([expect.objectContaining({ seq: 100, flags: SYN })]);
      expect(connection.nextDeadline()).toBe(3000);

      connection.onTimer(3000);
      expect(connection.nextDeadline()).toBe(7000);

      connection.onTimer(7000);
      expect(connection.state).toBe(ConnectionState.Closed);
      expect(connection.error).toBeInstanceOf(ConnectError);
      expect(connection.error?.message).toBe('Connection to 10.0.0.2:80 timed out after 2 retries');
      expect(onFailed).toHaveBeenCalledTimes(1);
      expect(connection.stats.retransmissions).toBe(2);
    });

    it('should fail with ConnectError when the peer refuses', () => {
      const connection = createConnection();
      connection.open(0);
      connection.handleSegment(fromPeer({ seq: 0, ack: 101, flags: RST | ACK, window: 0 }), 20);

      expect(connection.state).toBe(ConnectionState.Closed);
      expect(connection.error).toBeInstanceOf(ConnectError);
      expect(connection.error?.message).toBe('Connection refused by 10.0.0.2:80');
    });

    it('should refuse a second open', () => {
      const connection = createConnection();
      connection.open(0);
      expect(() => connection.open(1)).toThrow(InvalidStateError);
    });
  });

  describe('passive open', () => {
    it('should answer a SYN with SYN+ACK and complete on the ACK', () => {
      const connection = createConnection();
      connection.accept(fromPeer({ seq: 700, flags: SYN }), 0);

      expect(channel.take()).toEqual([expect.objectContaining({ seq: 100, ack: 701, flags: SYN | ACK })]);
      expect(connection.state).toBe(ConnectionState.SynReceived);

      connection.handleSegment(fromPeer({ seq: 701, ack: 101, flags: ACK }), 15);
      expect(connection.state).toBe(ConnectionState.Established);
      expect(connection.info().smoothedRtt).toBe(15);
    });

    it('should deliver data carried by the completing ACK', () => {
      const connection = createConnection();
      connection.accept(fromPeer({ seq: 700, flags: SYN }), 0);
      channel.take();

      connection.handleSegment(fromPeer({ seq: 701, ack: 101, flags: ACK | PSH, payload: Buffer.from('hi') }), 15);

      expect(connection.readableBytes).toBe(2);
      expect(channel.take()).toEqual([expect.objectContaining({ ack: 703, flags: ACK })]);
    });

    it('should repeat the SYN+ACK when the SYN is repeated', () => {
      const connection = createConnection();
      connection.accept(fromPeer({ seq: 700, flags: SYN }), 0);
      channel.take();

      connection.handleSegment(fromPeer({ seq: 700, flags: SYN }), 500);
      expect(channel.take()).toEqual([expect.objectContaining({ seq: 100, ack: 701, flags: SYN | ACK })]);
    });

    it('should reject accept() without a SYN', () => {
      const connection = createConnection();
      expect(() => connection.accept(fromPeer({ seq: 700, flags: ACK }), 0)).toThrow('accept() needs a SYN segment');
    });
  });

  describe('data transfer', () => {
    it('should send within the congestion window and grow it per ACK', () => {
      const connection = established();
      connection.write(Buffer.alloc(250, 1), 20);
      expect(channel.take()).toEqual([expect.objectContaining({ seq: 101, ack: 501, flags: ACK | PSH })]);

      connection.handleSegment(fromPeer({ seq: 501, ack: 201, flags: ACK }), 40);
      const sent = channel.take();
      expect(sent.map((segment) => [segment.seq, segment.payload.length])).toEqual([
        [201, 100],
        [301, 50],
      ]);
      expect(connection.info().congestionWindow).toBe(200);
      expect(connection.stats.bytesAcked).toBe(100);
    });

    it('should hold writes made during the handshake until it completes', () => {
      const connection = createConnection();
      connection.open(0);
      expect(connection.write(Buffer.from('early'), 0)).toBe(5);
      expect(channel.take()).toHaveLength(1);

      connection.handleSegment(fromPeer({ seq: 500, ack: 101, flags: SYN | ACK }), 20);
      const sent = channel.take();
      expect(sent).toHaveLength(2);
      expect(sent[1]).toMatchObject({ seq: 101, flags: ACK | PSH });
      expect(sent[1].payload.toString()).toBe('early');
    });

    it('should deliver received bytes and acknowledge them', () => {
      const connection = established();
      const onData = vi.fn();
      connection.on('data', onData);

      connection.handleSegment(fromPeer({ seq: 501, ack: 101, flags: ACK | PSH, payload: Buffer.from('hello') }), 30);

      expect(onData).toHaveBeenCalledWith({ bytes: 5 });
      expect(channel.take()).toEqual([expect.objectContaining({ seq: 101, ack: 506, window: 65530, flags: ACK })]);
      expect(Buffer.concat([...connection.read(30)]).toString()).toBe('hello');
      expect(connection.readableBytes).toBe(0);
    });

    it('should send a window update once reading reopens a closed window', () => {
      const connection = established({ maxReceiveWindow: 200 });
      connection.handleSegment(fromPeer({ seq: 501, ack: 101, flags: ACK, payload: Buffer.alloc(200) }), 30);
      expect(channel.take()).toEqual([expect.objectContaining({ ack: 701, window: 0 })]);

      [...connection.read(40)];
      expect(channel.take()).toEqual([expect.objectContaining({ ack: 701, window: 200, flags: ACK })]);
    });
  });

  describe('retransmission', () => {
    it('should retransmit the oldest segment on timeout and collapse the window', () => {
      const connection = established();
      connection.write(Buffer.alloc(100, 7), 20);
      channel.take();
      expect(connection.nextDeadline()).toBe(220);

      connection.onTimer(220);

      const [resent] = channel.take();
      expect(resent).toMatchObject({ seq: 101, flags: ACK | PSH });
      expect(resent.payload.length).toBe(100);
      expect(connection.stats.timeouts).toBe(1);
      expect(connection.stats.retransmissions).toBe(1);
      expect(connection.info().congestionWindow).toBe(100);
      expect(connection.info().slowStartThreshold).toBe(200);
      expect(connection.nextDeadline()).toBe(620);
    });

    it('should fast-retransmit on the third duplicate ACK', () => {
      const connection = established({ initialCongestionWindow: 400 });
      const onRetransmit = vi.fn();
      connection.on('retransmit', onRetransmit);
      connection.write(Buffer.alloc(400), 20);
      expect(channel.take()).toHaveLength(4);

      for (let i = 0; i < 3; i++) {
        connection.handleSegment(fromPeer({ seq: 501, ack: 101, flags: ACK }), 40 + i);
      }

      expect(channel.take()).toEqual([expect.objectContaining({ seq: 101 })]);
      expect(onRetransmit).toHaveBeenCalledWith({ seq: 101, reason: 'fast-retransmit', now: 42 });
      expect(connection.stats).toMatchObject({ duplicateAcks: 3, fastRetransmits: 1, retransmissions: 1, timeouts: 0 });
      expect(connection.info().congestionWindow).toBe(500);
    });

    it('should not count an ACK that changes the window as a duplicate', () => {
      const connection = established({ initialCongestionWindow: 400 });
      connection.write(Buffer.alloc(400), 20);
      channel.take();

      connection.handleSegment(fromPeer({ seq: 501, ack: 101, flags: ACK }), 40);
      connection.handleSegment(fromPeer({ seq: 501, ack: 101, flags: ACK, window: 60000 }), 41);
      connection.handleSegment(fromPeer({ seq: 501, ack: 101, flags: ACK, window: 60000 }), 42);

      expect(channel.take()).toEqual([]);
      expect(connection.stats).toMatchObject({ duplicateAcks: 2, fastRetransmits: 0, retransmissions: 0 });
    });

    it('should emit drain when a window update reopens a closed window', () => {
      const connection = established();
      const onDrain = vi.fn();
      connection.on('drain', onDrain);
      connection.write(Buffer.alloc(100), 20);
      channel.take();

      connection.handleSegment(fromPeer({ seq: 501, ack: 201, flags: ACK, window: 0 }), 40);
      expect(onDrain).toHaveBeenLastCalledWith({ freed: 100 });
      expect(connection.admissibleBytes).toBe(0);

      connection.handleSegment(fromPeer({ seq: 501, ack: 201, flags: ACK, window: 300 }), 60);
      expect(onDrain).toHaveBeenCalledTimes(2);
      expect(onDrain).toHaveBeenLastCalledWith({ freed: 0 });
      expect(connection.admissibleBytes).toBe(200);

      connection.handleSegment(fromPeer({ seq: 501, ack: 201, flags: ACK, window: 400 }), 70);
      expect(onDrain).toHaveBeenCalledTimes(2);
    });

    it('should probe a zero window and resume when it reopens', () => {
      const connection = established({}, 0);
      connection.write(Buffer.alloc(50), 20);
      expect(channel.take()).toEqual([]);
      expect(connection.nextDeadline()).toBe(220);

      connection.onTimer(220);
      const [probe] = channel.take();
      expect(probe.seq).toBe(101);
      expect(probe.payload.length).toBe(1);
      expect(connection.stats.timeouts).toBe(0);

      connection.handleSegment(fromPeer({ seq: 501, ack: 101, flags: ACK, window: 100 }), 240);
      const sent = channel.take();
      expect(sent.map((segment) => [segment.seq, segment.payload.length])).toEqual([
        [101, 1],
        [102, 49],
      ]);
    });
  });

  describe('closing', () => {
    it('should complete an active close through TIME_WAIT', () => {
      const connection = established();
      const onClosed = vi.fn();
      connection.on('closed', onClosed);

      connection.close(30);
      expect(connection.state).toBe(ConnectionState.FinWait);
      expect(channel.take()).toEqual([expect.objectContaining({ seq: 101, flags: FIN | ACK })]);

      connection.handleSegment(fromPeer({ seq: 501, ack: 102, flags: ACK }), 50);
      expect(connection.state).toBe(ConnectionState.FinWait);

      connection.handleSegment(fromPeer({ seq: 501, ack: 102, flags: FIN | ACK }), 60);
      expect(connection.state).toBe(ConnectionState.TimeWait);
      expect(channel.take()).toEqual([expect.objectContaining({ seq: 102, ack: 502, flags: ACK })]);
      expect(connection.nextDeadline()).toBe(1060);

      connection.onTimer(1060);
      expect(connection.state).toBe(ConnectionState.Closed);
      expect(onClosed).toHaveBeenCalledWith({ reset: false });
      expect(connection.nextDeadline()).toBeUndefined();
    });

    it('should complete a passive close through LAST_ACK', () => {
      const connection = established();
      const onEnd = vi.fn();
      connection.on('end', onEnd);

      connection.handleSegment(fromPeer({ seq: 501, ack: 101, flags: FIN | ACK }), 30);
      expect(onEnd).toHaveBeenCalledTimes(1);
      expect(connection.state).toBe(ConnectionState.CloseWait);
      expect(connection.remoteFinished).toBe(true);

      connection.write(Buffer.from('bye'), 31);
      connection.close(31);
      expect(connection.state).toBe(ConnectionState.LastAck);
      const sent = channel.take();
      expect(sent.map((segment) => [segment.seq, segment.flags])).toEqual([
        [101, ACK | PSH],
        [104, FIN | ACK],
      ]);

      connection.handleSegment(fromPeer({ seq: 502, ack: 105, flags: ACK }), 50);
      expect(connection.state).toBe(ConnectionState.Closed);
      expect(connection.error).toBeNull();
    });

    it('should pass through CLOSING when both sides close at once', () => {
      const connection = established();
      connection.close(30);
      connection.handleSegment(fromPeer({ seq: 501, ack: 101, flags: FIN | ACK }), 40);
      expect(connection.state).toBe(ConnectionState.Closing);

      connection.handleSegment(fromPeer({ seq: 502, ack: 102, flags: ACK }), 50);
      expect(connection.state).toBe(ConnectionState.TimeWait);
    });

    it('should send the FIN after the handshake when closed during it', () => {
      const connection = createConnection();
      connection.open(0);
      connection.write(Buffer.from('x'), 0);
      connection.close(0);
      channel.take();

      connection.handleSegment(fromPeer({ seq: 500, ack: 101, flags: SYN | ACK }), 20);
      expect(connection.state).toBe(ConnectionState.FinWait);
      const sent = channel.take();
      expect(sent[sent.length - 1]).toMatchObject({ seq: 101, flags: FIN | ACK | PSH });
    });

    it('should refuse writes after close', () => {
      const connection = established();
      connection.close(30);
      expect(() => connection.write(Buffer.from('late'), 31)).toThrow(InvalidStateError);
    });

    it('should keep delivered bytes readable after a graceful close', () => {
      const connection = established();
      connection.handleSegment(fromPeer({ seq: 501, ack: 101, flags: FIN | ACK | PSH, payload: Buffer.from('tail') }), 30);
      connection.close(31);
      connection.handleSegment(fromPeer({ seq: 506, ack: 102, flags: ACK }), 50);

      expect(connection.state).toBe(ConnectionState.Closed);
      expect(Buffer.concat([...connection.read(60)]).toString()).toBe('tail');
    });
  });

  describe('reset', () => {
    it('should send RST on abort and fail later calls', () => {
      const connection = established();
      const onClosed = vi.fn();
      connection.on('closed', onClosed);

      connection.abort(30);

      expect(channel.take()).toEqual([expect.objectContaining({ seq: 101, ack: 501, flags: RST | ACK })]);
      expect(connection.state).toBe(ConnectionState.Closed);
      expect(onClosed).toHaveBeenCalledWith({ reset: true });
      expect(() => connection.write(Buffer.from('x'), 31)).toThrow(ConnectionReset);
      expect(() => connection.read(31)).toThrow('Connection aborted');
    });

    it('should fail with ConnectionReset on an in-window RST', () => {
      const connection = established();
      const onFailed = vi.fn();
      connection.on('failed', onFailed);

      connection.handleSegment(fromPeer({ seq: 501, flags: RST }), 30);

      expect(connection.state).toBe(ConnectionState.Closed);
      const error = connection.error;
      expect(error).toBeInstanceOf(ConnectionReset);
      if (error instanceof ConnectionReset) {
        expect(error.local).toBe(false);
      }
      expect(onFailed).toHaveBeenCalledTimes(1);
    });

    it('should ignore a RST outside the receive window', () => {
      const connection = established();
      connection.handleSegment(fromPeer({ seq: 501 + 70000, flags: RST }), 30);
      expect(connection.state).toBe(ConnectionState.Established);
    });
  });

  describe('channel refusals', () => {
    it('should retry refused datagrams with a doubling delay', () => {
      channel.refuse = 2;
      const connection = createConnection();
      connection.open(0);
      expect(connection.nextDeadline()).toBe(5);

      connection.onTimer(5);
      expect(channel.sent).toHaveLength(0);
      expect(connection.nextDeadline()).toBe(15);

      connection.onTimer(15);
      expect(channel.take()).toEqual([expect.objectContaining({ seq: 100, flags: SYN })]);
      expect(connection.stats.sendRetries).toBe(2);
      expect(connection.nextDeadline()).toBe(1000);
    });
  });
});
