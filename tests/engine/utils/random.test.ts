import { describe, it, expect } from 'vitest';
import { createRandom, randomBytes, randomInt, randomSequence } from '../../../src/engine/utils/random.js';

describe('Seeded randomness', () => {
  it('should replay the same numbers for the same seed', () => {
    const a = createRandom(42);
    const b = createRandom(42);
    const first = Array.from({ length: 20 }, () => a());
    const second = Array.from({ length: 20 }, () => b());
    expect(first).toEqual(second);
  });

  it('should produce different numbers for different seeds', () => {
    const a = createRandom(1);
    const b = createRandom(2);
    expect(Array.from({ length: 5 }, () => a())).not.toEqual(Array.from({ length: 5 }, () => b()));
  });

  it('should stay within [0, 1)', () => {
    const random = createRandom(7);
    for (let i = 0; i < 1000; i++) {
      const value = random();
      expect(value).toBeGreaterThanOrEqual(0);
      expect(value).toBeLessThan(1);
    }
  });

  it('should draw integers below the bound', () => {
    const random = createRandom(3);
    for (let i = 0; i < 200; i++) {
      const value = randomInt(random, 6);
      expect(Number.isInteger(value)).toBe(true);
      expect(value).toBeGreaterThanOrEqual(0);
      expect(value).toBeLessThan(6);
    }
  });

  it('should draw 32-bit sequence numbers', () => {
    const random = createRandom(9);
    for (let i = 0; i < 100; i++) {
      const seq = randomSequence(random);
      expect(seq).toBeGreaterThanOrEqual(0);
      expect(seq).toBeLessThanOrEqual(0xffffffff);
    }
  });

  it('should fill a buffer reproducibly', () => {
    const bytes = randomBytes(createRandom(5), 64);
    expect(bytes.length).toBe(64);
    expect(bytes.equals(randomBytes(createRandom(5), 64))).toBe(true);
  });
});
