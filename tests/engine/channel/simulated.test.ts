import { describe, it, expect, vi } from 'vitest';
import { SimulatedNetwork } from '../../../src/engine/channel/simulated.js';
import type { Channel } from '../../../src/engine/channel/types.js';
import { TransientFailure } from '../../../src/engine/types.js';

function received(channel: Channel, now: number): string[] {
  return [...channel.receive(now)].map(({ datagram }) => datagram.toString());
}

function bitsDiffering(a: Buffer, b: Buffer): number {
  let count = 0;
  for (let i = 0; i < a.length; i++) {
    let x = a[i] ^ b[i];
    while (x) {
      count += x & 1;
      x >>= 1;
    }
  }
  return count;
}

describe('SimulatedNetwork', () => {
  describe('delivery', () => {
    it('should deliver after the latency', () => {
      const network = new SimulatedNetwork();
      const a = network.attach('a');
      const b = network.attach('b');

      expect(a.send(Buffer.from('hello'), 'b')).toEqual({ ok: true });
      expect(network.nextDeliveryTime()).toBe(10);
      expect(received(b, 9)).toEqual([]);

      const [datagram] = [...b.receive(10)];
      expect(datagram.from).toBe('a');
      expect(datagram.datagram.toString()).toBe('hello');
      expect(network.metrics.sent).toBe(1);
      expect(network.metrics.delivered).toBe(1);
      expect(network.inFlight).toBe(0);
    });

    it('should copy datagrams on send', () => {
      const network = new SimulatedNetwork();
      const a = network.attach('a');
      const b = network.attach('b');
      const buffer = Buffer.from('abc');
      a.send(buffer, 'b');
      buffer[0] = 0x7a;
      expect(received(b, 10)).toEqual(['abc']);
    });

    it('should keep send order for equal arrival times', () => {
      const network = new SimulatedNetwork();
      const a = network.attach('a');
      const b = network.attach('b');
      a.send(Buffer.from('first'), 'b');
      a.send(Buffer.from('second'), 'b');
      expect(received(b, 10)).toEqual(['first', 'second']);
    });

    it('should deliver only to the addressed host', () => {
      const network = new SimulatedNetwork();
      const a = network.attach('a');
      network.attach('b');
      a.send(Buffer.from('x'), 'b');
      expect(received(a, 100)).toEqual([]);
      expect(network.inFlight).toBe(1);
    });

    it('should add jitter below the configured bound', () => {
      const network = new SimulatedNetwork({ jitter: 5, seed: 3 });
      const a = network.attach('a');
      network.attach('b');
      a.send(Buffer.from('x'), 'b');
      const at = network.nextDeliveryTime() ?? 0;
      expect(at).toBeGreaterThanOrEqual(10);
      expect(at).toBeLessThan(15);
    });

    it('should schedule from the current clock', () => {
      const network = new SimulatedNetwork({ latency: 20 });
      const a = network.attach('a');
      network.attach('b');
      network.advanceTo(100);
      network.advanceTo(50);
      a.send(Buffer.from('x'), 'b');
      expect(network.now).toBe(100);
      expect(network.nextDeliveryTime()).toBe(120);
    });
  });

  describe('impairments', () => {
    it('should lose datagrams', () => {
      const network = new SimulatedNetwork({ lossRate: 1 });
      const a = network.attach('a');
      const b = network.attach('b');
      const onSend = vi.fn();
      network.on('send', onSend);

      expect(a.send(Buffer.from('x'), 'b').ok).toBe(true);
      expect(received(b, 1000)).toEqual([]);
      expect(network.metrics.lost).toBe(1);
      expect(onSend).toHaveBeenCalledWith(expect.objectContaining({ outcome: 'lost', from: 'a', to: 'b', size: 1 }));
    });

    it('should drop what the predicate selects', () => {
      const network = new SimulatedNetwork({ drop: (datagram) => datagram.toString() === 'drop me' });
      const a = network.attach('a');
      const b = network.attach('b');
      a.send(Buffer.from('drop me'), 'b');
      a.send(Buffer.from('keep me'), 'b');
      expect(received(b, 10)).toEqual(['keep me']);
      expect(network.metrics.lost).toBe(1);
    });

    it('should duplicate datagrams', () => {
      const network = new SimulatedNetwork({ duplicateRate: 1 });
      const a = network.attach('a');
      const b = network.attach('b');
      a.send(Buffer.from('twice'), 'b');
      expect(received(b, 10)).toEqual(['twice', 'twice']);
      expect(network.metrics.duplicated).toBe(1);
    });

    it('should flip exactly one bit when corrupting', () => {
      const network = new SimulatedNetwork({ corruptRate: 1, seed: 11 });
      const a = network.attach('a');
      const b = network.attach('b');
      const original = Buffer.from('corrupt this datagram');
      a.send(original, 'b');

      const [{ datagram }] = [...b.receive(10)];
      expect(bitsDiffering(original, datagram)).toBe(1);
      expect(network.metrics.corrupted).toBe(1);
    });

    it('should hold back reordered datagrams', () => {
      const network = new SimulatedNetwork({ reorderRate: 1, reorderDelay: 50 });
      const a = network.attach('a');
      const b = network.attach('b');
      a.send(Buffer.from('late'), 'b');
      network.setConditions({ reorderRate: 0 });
      a.send(Buffer.from('early'), 'b');

      expect(received(b, 10)).toEqual(['early']);
      expect(received(b, 60)).toEqual(['late']);
      expect(network.metrics.reordered).toBe(1);
    });

    it('should count datagrams for unknown hosts', () => {
      const network = new SimulatedNetwork();
      const a = network.attach('a');
      expect(a.send(Buffer.from('x'), 'nowhere')).toEqual({ ok: true });
      expect(network.metrics.unroutable).toBe(1);
      expect(network.inFlight).toBe(0);
    });
  });

  describe('back-pressure', () => {
    it('should refuse sends beyond the per-host queue capacity', () => {
      const network = new SimulatedNetwork({ queueCapacity: 2 });
      const a = network.attach('a');
      const b = network.attach('b');
      a.send(Buffer.from('1'), 'b');
      a.send(Buffer.from('2'), 'b');

      const result = a.send(Buffer.from('3'), 'b');
      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error).toBeInstanceOf(TransientFailure);
      }
      expect(network.metrics.refused).toBe(1);
      expect(network.metrics.sent).toBe(2);

      // Other hosts have their own queue
      expect(b.send(Buffer.from('reply'), 'a').ok).toBe(true);

      received(b, 10);
      expect(a.send(Buffer.from('3'), 'b').ok).toBe(true);
    });

    it('should refuse at random when asked to', () => {
      const network = new SimulatedNetwork({ refuseRate: 1 });
      const a = network.attach('a');
      network.attach('b');
      expect(a.send(Buffer.from('x'), 'b').ok).toBe(false);
      expect(network.inFlight).toBe(0);
    });
  });

  describe('configuration', () => {
    it('should clamp conditions into range', () => {
      const network = new SimulatedNetwork({ lossRate: 2, latency: -5, jitter: Number.NaN });
      expect(network.conditions.lossRate).toBe(1);
      expect(network.conditions.latency).toBe(0);
      expect(network.conditions.jitter).toBe(0);
    });

    it('should keep unspecified conditions when updating', () => {
      const network = new SimulatedNetwork({ latency: 30, lossRate: 0.1 });
      network.setConditions({ lossRate: 0.2 });
      expect(network.conditions.latency).toBe(30);
      expect(network.conditions.lossRate).toBe(0.2);
    });

    it('should reject a second attach of the same address', () => {
      const network = new SimulatedNetwork();
      network.attach('a');
      expect(() => network.attach('a')).toThrow('Address already attached: a');
    });

    it('should replay the same losses for the same seed', () => {
      const run = (): string[] => {
        const network = new SimulatedNetwork({ lossRate: 0.5, seed: 99 });
        const a = network.attach('a');
        const b = network.attach('b');
        for (let i = 0; i < 40; i++) {
          a.send(Buffer.from(String(i)), 'b');
        }
        return received(b, 10);
      };
      expect(run()).toEqual(run());
    });
  });
});
