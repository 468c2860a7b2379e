import { describe, it, expect } from 'vitest';
import { SendBuffer } from '../../../src/engine/send/buffer.js';

function bytes(length: number): Buffer {
  return Buffer.from(Array.from({ length }, (_, i) => i % 256));
}

function createBuffer(window = 1000, peerWindow = 65535) {
  const congestion = { window };
  const buffer = new SendBuffer({ initialSequence: 1000, mss: 500, peerWindow, congestion });
  return { buffer, congestion };
}

describe('SendBuffer', () => {
  describe('admission', () => {
    it('should send full segments while the window allows', () => {
      const { buffer } = createBuffer(1000);
      const data = bytes(1200);
      buffer.write(data);

      const first = buffer.nextSegment(0);
      const second = buffer.nextSegment(0);
      expect(first?.seq).toBe(1000);
      expect(first?.payload.equals(data.subarray(0, 500))).toBe(true);
      expect(second?.seq).toBe(1500);
      expect(second?.payload.length).toBe(500);
      expect(buffer.nextSegment(0)).toBeNull();

      expect(buffer.bytesInFlight).toBe(1000);
      expect(buffer.unsentBytes).toBe(200);
      expect(buffer.admissibleBytes()).toBe(0);
    });

    it('should limit admission by the smaller of both windows', () => {
      const { buffer } = createBuffer(1000, 600);
      buffer.write(bytes(2000));
      buffer.nextSegment(0);
      expect(buffer.admissibleBytes()).toBe(100);
    });

    it('should hold back a small segment while data is in flight', () => {
      const { buffer } = createBuffer(700);
      buffer.write(bytes(1200));
      expect(buffer.nextSegment(0)?.payload.length).toBe(500);
      expect(buffer.admissibleBytes()).toBe(200);
      expect(buffer.nextSegment(0)).toBeNull();
    });

    it('should send a short final segment', () => {
      const { buffer } = createBuffer(1000);
      buffer.write(bytes(1200));
      buffer.nextSegment(0);
      buffer.nextSegment(0);
      buffer.onAck(1500, 65535, 40);

      const tail = buffer.nextSegment(40);
      expect(tail?.seq).toBe(2000);
      expect(tail?.payload.length).toBe(200);
    });

    it('should return nothing when nothing was written', () => {
      const { buffer } = createBuffer();
      expect(buffer.nextSegment(0)).toBeNull();
      expect(buffer.hasUnsent).toBe(false);
    });
  });

  describe('acknowledgments', () => {
    it('should release acknowledged bytes and measure the round trip', () => {
      const { buffer } = createBuffer(1000);
      buffer.write(bytes(1000));
      buffer.nextSegment(0);
      buffer.nextSegment(0);

      expect(buffer.onAck(1500, 65535, 40)).toEqual({ kind: 'new', freed: 500, rttSample: 40, finAcked: false });
      expect(buffer.sendBase).toBe(1500);
      expect(buffer.bufferedBytes).toBe(500);
    });

    it('should classify acknowledgment numbers', () => {
      const { buffer } = createBuffer(1000);
      buffer.write(bytes(500));
      buffer.nextSegment(0);

      expect(buffer.onAck(1000, 65535, 1).kind).toBe('duplicate');
      expect(buffer.onAck(999, 65535, 1).kind).toBe('stale');
      expect(buffer.onAck(1501, 65535, 1).kind).toBe('invalid');
      expect(buffer.onAck(1500, 65535, 1).kind).toBe('new');
      expect(buffer.onAck(1500, 4000, 1).kind).toBe('update');
      expect(buffer.peerWindow).toBe(4000);
    });

    it('should not take the peer window from a stale ACK', () => {
      const { buffer } = createBuffer(1000);
      buffer.write(bytes(500));
      buffer.nextSegment(0);
      buffer.onAck(999, 0, 1);
      expect(buffer.peerWindow).toBe(65535);
    });

    it('should trim a partly acknowledged segment', () => {
      const { buffer } = createBuffer(1000);
      const data = bytes(500);
      buffer.write(data);
      buffer.nextSegment(0);

      expect(buffer.onAck(1200, 65535, 10).freed).toBe(200);
      const resend = buffer.retransmitOldest(20);
      expect(resend?.seq).toBe(1200);
      expect(resend?.payload.equals(data.subarray(200))).toBe(true);
    });

    it('should keep sequence offsets across many small writes', () => {
      const { buffer } = createBuffer(1000);
      const first = Buffer.from('abc');
      buffer.write(first);
      buffer.write(Buffer.from('def'));
      buffer.write(Buffer.from('ghi'));
      first.write('xyz');

      expect(buffer.nextSegment(0)?.payload.toString()).toBe('abcdefghi');
      expect(buffer.onAck(1004, 65535, 10).freed).toBe(4);
      expect(buffer.bufferedBytes).toBe(5);
      expect(buffer.retransmitOldest(20)?.payload.toString()).toBe('efghi');
    });
  });

  describe('retransmission', () => {
    it('should resend the oldest segment with its original sequence number', () => {
      const { buffer } = createBuffer(1000);
      const data = bytes(1000);
      buffer.write(data);
      buffer.nextSegment(0);
      buffer.nextSegment(0);

      const resend = buffer.retransmitOldest(100);
      expect(resend).toEqual({ seq: 1000, payload: data.subarray(0, 500), fin: false, retransmission: true });
      expect(buffer.sendNext).toBe(2000);
    });

    it('should not sample the round trip of a retransmitted segment', () => {
      const { buffer } = createBuffer(1000);
      buffer.write(bytes(500));
      buffer.nextSegment(0);
      buffer.retransmitOldest(100);
      expect(buffer.onAck(1500, 65535, 150).rttSample).toBeUndefined();
    });

    it('should return null with nothing in flight', () => {
      const { buffer } = createBuffer();
      expect(buffer.retransmitOldest(0)).toBeNull();
    });
  });

  describe('FIN', () => {
    it('should ride on the last data segment', () => {
      const { buffer } = createBuffer(1000);
      buffer.write(bytes(300));
      buffer.finish();

      const segment = buffer.nextSegment(0);
      expect(segment?.fin).toBe(true);
      expect(segment?.payload.length).toBe(300);
      expect(buffer.sendNext).toBe(1301);
      expect(buffer.nextSegment(0)).toBeNull();

      expect(buffer.onAck(1301, 65535, 30)).toEqual({ kind: 'new', freed: 300, rttSample: 30, finAcked: true });
      expect(buffer.finAcked).toBe(true);
    });

    it('should go alone when no data is pending', () => {
      const { buffer } = createBuffer(1000);
      buffer.finish();
      expect(buffer.hasUnsent).toBe(true);

      const segment = buffer.nextSegment(0);
      expect(segment).toEqual({ seq: 1000, payload: Buffer.alloc(0), fin: true, retransmission: false });
      expect(buffer.onAck(1001, 65535, 5).finAcked).toBe(true);
    });

    it('should refuse writes after finish', () => {
      const { buffer } = createBuffer();
      buffer.finish();
      expect(() => buffer.write(Buffer.from('late'))).toThrow('Cannot write after finish()');
    });
  });

  describe('zero window', () => {
    it('should probe with one byte once everything is acknowledged', () => {
      const { buffer } = createBuffer(1000);
      buffer.write(bytes(1500));
      buffer.nextSegment(0);
      buffer.nextSegment(0);
      buffer.onAck(2000, 0, 20);

      expect(buffer.nextSegment(20)).toBeNull();
      const probe = buffer.probeSegment(20);
      expect(probe?.seq).toBe(2000);
      expect(probe?.payload.length).toBe(1);
      expect(buffer.bytesInFlight).toBe(1);
      expect(buffer.probeSegment(20)).toBeNull();
    });

    it('should not probe an open window', () => {
      const { buffer } = createBuffer(1000);
      buffer.write(bytes(10));
      expect(buffer.probeSegment(0)).toBeNull();
    });
  });
});
