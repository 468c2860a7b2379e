import { describe, it, expect } from 'vitest';
import { RttEstimator } from '../../../src/engine/timer/rtt.js';

describe('RttEstimator', () => {
  it('should start at the initial timeout with no estimate', () => {
    const rtt = new RttEstimator({ initialTimeout: 1000 });
    expect(rtt.rto).toBe(1000);
    expect(rtt.smoothedRtt).toBeUndefined();
    expect(rtt.rttVariance).toBeUndefined();
  });

  it('should seed the estimate from the first sample', () => {
    const rtt = new RttEstimator();
    rtt.push(100);
    expect(rtt.smoothedRtt).toBe(100);
    expect(rtt.rttVariance).toBe(50);
    expect(rtt.rto).toBe(300);
  });

  it('should smooth later samples', () => {
    const rtt = new RttEstimator();
    rtt.push(100);
    rtt.push(60);
    expect(rtt.rttVariance).toBe(47.5);
    expect(rtt.smoothedRtt).toBe(95);
    expect(rtt.rto).toBe(285);
  });

  it('should clamp to the minimum timeout', () => {
    const rtt = new RttEstimator({ minTimeout: 200 });
    rtt.push(10);
    expect(rtt.rto).toBe(200);
  });

  it('should double on backoff up to the maximum', () => {
    const rtt = new RttEstimator({ initialTimeout: 1000, maxTimeout: 60000 });
    const timeouts = [1, 2, 3, 4, 5, 6, 7].map(() => rtt.backoff());
    expect(timeouts).toEqual([2000, 4000, 8000, 16000, 32000, 60000, 60000]);
  });

  it('should replace a backed-off timeout with a fresh sample', () => {
    const rtt = new RttEstimator();
    rtt.backoff();
    rtt.push(100);
    expect(rtt.rto).toBe(300);
  });
});
