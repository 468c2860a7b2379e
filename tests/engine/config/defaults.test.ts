import { describe, it, expect } from 'vitest';
import {
  CONFIG_KEYS,
  DEFAULT_CONFIG,
  mergeWithDefaults,
  resolveConfig,
  validateConfig,
} from '../../../src/engine/config/defaults.js';
import { ConfigError } from '../../../src/engine/types.js';

describe('Transport configuration', () => {
  describe('DEFAULT_CONFIG', () => {
    it('should be valid', () => {
      expect(validateConfig({ ...DEFAULT_CONFIG })).toEqual(DEFAULT_CONFIG);
    });

    it('should list every option in CONFIG_KEYS', () => {
      expect([...CONFIG_KEYS].sort()).toEqual(Object.keys(DEFAULT_CONFIG).sort());
    });
  });

  describe('mergeWithDefaults', () => {
    it('should return a copy of the defaults without input', () => {
      const merged = mergeWithDefaults();
      expect(merged).toEqual(DEFAULT_CONFIG);
      expect(merged).not.toBe(DEFAULT_CONFIG);
    });

    it('should override only the given options', () => {
      const merged = mergeWithDefaults({ mss: 500, timeWaitDuration: 50 });
      expect(merged.mss).toBe(500);
      expect(merged.timeWaitDuration).toBe(50);
      expect(merged.initialTimeout).toBe(DEFAULT_CONFIG.initialTimeout);
    });

    it('should ignore undefined values', () => {
      expect(mergeWithDefaults({ mss: undefined }).mss).toBe(DEFAULT_CONFIG.mss);
    });
  });

  describe('validateConfig', () => {
    it('should reject negative and fractional values', () => {
      expect(() => resolveConfig({ timeWaitDuration: -1 })).toThrow(ConfigError);
      expect(() => resolveConfig({ maxSynRetries: 1.5 })).toThrow('maxSynRetries must be an integer');
    });

    it('should reject a segment size outside the header field', () => {
      expect(() => resolveConfig({ mss: 0, initialCongestionWindow: 0 })).toThrow(ConfigError);
    });

    it('should require the receive window to hold a segment', () => {
      expect(() => resolveConfig({ mss: 1000, maxReceiveWindow: 999 })).toThrow(
        'maxReceiveWindow must be between mss (1000) and 65535'
      );
    });

    it('should require the initial window to hold a segment', () => {
      expect(() => resolveConfig({ mss: 2000 })).toThrow('initialCongestionWindow must be at least one mss');
    });

    it('should keep timeouts ordered', () => {
      expect(() => resolveConfig({ minTimeout: 2000, maxTimeout: 1000 })).toThrow(ConfigError);
      expect(() => resolveConfig({ initialTimeout: 100 })).toThrow(
        'initialTimeout must lie between minTimeout and maxTimeout'
      );
    });

    it('should name the offending option', () => {
      try {
        resolveConfig({ duplicateAckThreshold: 0 });
        expect.unreachable();
      } catch (err) {
        expect(err).toBeInstanceOf(ConfigError);
        if (err instanceof ConfigError) {
          expect(err.option).toBe('duplicateAckThreshold');
          expect(err.name).toBe('ConfigError');
        }
      }
    });
  });
});
