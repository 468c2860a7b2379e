/**
 * Default configuration values for the transport engine.
 *
 * These defaults model a small simulated network: a 1 KiB segment size,
 * a 64 KiB receive buffer and timeouts measured in simulated milliseconds.
 *
 * @module engine/config/defaults
 */

import { ConfigError, type TransportConfig } from '../types.js';

/**
 * Default transport configuration.
 */
export const DEFAULT_CONFIG: TransportConfig = {
  /** Retransmission timeout until the first round-trip sample (1 second) */
  initialTimeout: 1000,

  /** Floor for the computed retransmission timeout */
  minTimeout: 200,

  /** Ceiling for the computed and backed-off retransmission timeout */
  maxTimeout: 60000,

  /** Maximum segment size */
  mss: 1024,

  /** Start with one full segment in flight */
  initialCongestionWindow: 1024,

  /** Large enough that slow start runs until the first loss */
  initialSlowStartThreshold: 65535,

  /** Largest window the 16-bit header field can carry */
  maxReceiveWindow: 65535,

  /** TIME_WAIT hold (2 x a nominal 500 ms segment lifetime) */
  timeWaitDuration: 1000,

  /** Classic fast-retransmit trigger */
  duplicateAckThreshold: 3,

  /** Handshake retransmissions before giving up */
  maxSynRetries: 5,

  /** First retry after the channel refuses a datagram */
  sendRetryDelay: 5,

  /** Channel retry backoff cap */
  maxSendRetryDelay: 320,
};

/** Every option name, in declaration order */
export const CONFIG_KEYS: readonly (keyof TransportConfig)[] = [
  'initialTimeout',
  'minTimeout',
  'maxTimeout',
  'mss',
  'initialCongestionWindow',
  'initialSlowStartThreshold',
  'maxReceiveWindow',
  'timeWaitDuration',
  'duplicateAckThreshold',
  'maxSynRetries',
  'sendRetryDelay',
  'maxSendRetryDelay',
];

/** Largest value a 16-bit header field can hold */
const MAX_UINT16 = 0xffff;

/**
 * Merges a partial configuration with the default configuration.
 *
 * @param partialConfig - Partial configuration to merge
 * @returns Complete configuration with defaults applied
 */
export function mergeWithDefaults(
  partialConfig?: Partial<TransportConfig>
): TransportConfig {
  if (!partialConfig) {
    return { ...DEFAULT_CONFIG };
  }

  const merged: TransportConfig = { ...DEFAULT_CONFIG };
  for (const key of CONFIG_KEYS) {
    const value = partialConfig[key];
    if (value !== undefined) {
      merged[key] = value;
    }
  }
  return merged;
}

/**
 * Checks that every option is a usable number and that related options
 * are consistent with each other.
 *
 * @throws {ConfigError} On the first invalid option
 */
export function validateConfig(config: TransportConfig): TransportConfig {
  for (const key of CONFIG_KEYS) {
    const value = config[key];
    if (typeof value !== 'number' || !Number.isFinite(value) || value < 0) {
      throw new ConfigError(`${key} must be a non-negative finite number`, key);
    }
    if (!Number.isInteger(value)) {
      throw new ConfigError(`${key} must be an integer`, key);
    }
  }

  if (config.mss < 1 || config.mss > MAX_UINT16) {
    throw new ConfigError(`mss must be between 1 and ${MAX_UINT16}`, 'mss');
  }
  if (config.maxReceiveWindow < config.mss || config.maxReceiveWindow > MAX_UINT16) {
    throw new ConfigError(
      `maxReceiveWindow must be between mss (${config.mss}) and ${MAX_UINT16}`,
      'maxReceiveWindow'
    );
  }
  if (config.initialCongestionWindow < config.mss) {
    throw new ConfigError('initialCongestionWindow must be at least one mss', 'initialCongestionWindow');
  }
  if (config.minTimeout < 1) {
    throw new ConfigError('minTimeout must be at least 1 ms', 'minTimeout');
  }
  if (config.minTimeout > config.maxTimeout) {
    throw new ConfigError('minTimeout must not exceed maxTimeout', 'minTimeout');
  }
  if (config.initialTimeout < config.minTimeout || config.initialTimeout > config.maxTimeout) {
    throw new ConfigError('initialTimeout must lie between minTimeout and maxTimeout', 'initialTimeout');
  }
  if (config.duplicateAckThreshold < 1) {
    throw new ConfigError('duplicateAckThreshold must be at least 1', 'duplicateAckThreshold');
  }
  if (config.sendRetryDelay < 1 || config.sendRetryDelay > config.maxSendRetryDelay) {
    throw new ConfigError('sendRetryDelay must be between 1 and maxSendRetryDelay', 'sendRetryDelay');
  }

  return config;
}

/**
 * Merges with defaults and validates in one step.
 */
export function resolveConfig(partialConfig?: Partial<TransportConfig>): TransportConfig {
  return validateConfig(mergeWithDefaults(partialConfig));
}
