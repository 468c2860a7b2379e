/**
 * Turns command-line flags and an optional JSON config file into the
 * options of a transfer run.
 *
 * A config file holds transport options at the top level and network
 * impairments under `network`:
 *
 * ```json
 * { "mss": 536, "initialTimeout": 500, "network": { "lossRate": 0.05 } }
 * ```
 *
 * Flags win over the file.
 *
 * @module cli/utils/options
 */

import { readFileSync } from 'fs';
import type { NetworkConditions } from '../../engine/channel/simulated.js';
import { CONFIG_KEYS, resolveConfig } from '../../engine/config/defaults.js';
import type { TransferOptions } from '../../engine/simulation/transfer.js';
import { ConfigError, type PartialTransportConfig, type TransportConfig } from '../../engine/types.js';

// =============================================================================
// Types
// =============================================================================

/**
 * Flags shared by the simulate and trace commands. Rates are fractions.
 */
export interface SimulationFlags {
  bytes?: number;
  loss?: number;
  duplicate?: number;
  reorder?: number;
  reorderDelay?: number;
  corrupt?: number;
  refuse?: number;
  latency?: number;
  jitter?: number;
  queue?: number;
  mss?: number;
  window?: number;
  seed?: number;
  maxTime?: number;

  /** Path to a JSON config file */
  config?: string;
}

/**
 * Contents of a config file after validation.
 */
export interface FileConfig {
  transport: PartialTransportConfig;
  network: Partial<NetworkConditions>;
}

type NetworkKey = keyof NetworkConditions;

const NETWORK_KEYS: readonly NetworkKey[] = [
  'lossRate',
  'duplicateRate',
  'reorderRate',
  'reorderDelay',
  'corruptRate',
  'refuseRate',
  'latency',
  'jitter',
  'queueCapacity',
];

const RATE_KEYS: ReadonlySet<NetworkKey> = new Set<NetworkKey>([
  'lossRate',
  'duplicateRate',
  'reorderRate',
  'corruptRate',
  'refuseRate',
]);

// =============================================================================
// Config File
// =============================================================================

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function findConfigKey(name: string): keyof TransportConfig | undefined {
  return CONFIG_KEYS.find((key) => key === name);
}

function findNetworkKey(name: string): NetworkKey | undefined {
  return NETWORK_KEYS.find((key) => key === name);
}

function requireNumber(value: unknown, option: string): number {
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    throw new ConfigError(`${option} must be a finite number`, option);
  }
  return value;
}

/**
 * Checks one network impairment: rates lie in [0, 1], everything else is
 * a non-negative duration or count.
 *
 * @throws {ConfigError} When the value is out of range
 */
export function checkNetworkValue(key: NetworkKey, value: number): number {
  if (RATE_KEYS.has(key)) {
    if (value < 0 || value > 1) {
      throw new ConfigError(`${key} must be between 0 and 1`, key);
    }
  } else if (value < 0) {
    throw new ConfigError(`${key} must not be negative`, key);
  }
  return value;
}

/**
 * Validates parsed JSON as a config file.
 *
 * @throws {ConfigError} On unknown options or values of the wrong type
 */
export function parseFileConfig(data: unknown): FileConfig {
  if (!isRecord(data)) {
    throw new ConfigError('Config file must contain a JSON object', 'config');
  }

  const result: FileConfig = { transport: {}, network: {} };

  for (const [name, value] of Object.entries(data)) {
    if (name === 'network') {
      if (!isRecord(value)) {
        throw new ConfigError('network must be an object', 'network');
      }
      for (const [networkName, networkValue] of Object.entries(value)) {
        const key = findNetworkKey(networkName);
        if (key === undefined) {
          throw new ConfigError(`Unknown network option: ${networkName}`, networkName);
        }
        result.network[key] = checkNetworkValue(key, requireNumber(networkValue, key));
      }
      continue;
    }

    const key = findConfigKey(name);
    if (key === undefined) {
      throw new ConfigError(`Unknown option: ${name}`, name);
    }
    result.transport[key] = requireNumber(value, key);
  }

  return result;
}

/**
 * Reads and validates a JSON config file.
 *
 * @throws {ConfigError} When the file cannot be read or parsed
 */
export function loadConfigFile(path: string): FileConfig {
  let text: string;
  try {
    text = readFileSync(path, 'utf8');
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new ConfigError(`Cannot read config file ${path}: ${reason}`, 'config');
  }

  let data: unknown;
  try {
    data = JSON.parse(text);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new ConfigError(`Invalid JSON in ${path}: ${reason}`, 'config');
  }

  return parseFileConfig(data);
}

// =============================================================================
// Flags
// =============================================================================

/**
 * Combines flags with an optional config file into transfer options.
 * The transport configuration is resolved here so that bad values are
 * reported before anything runs.
 *
 * @throws {ConfigError} On any invalid option
 */
export function buildTransferOptions(
  flags: SimulationFlags,
  file: FileConfig = { transport: {}, network: {} }
): TransferOptions {
  const transport: PartialTransportConfig = { ...file.transport };
  if (flags.mss !== undefined) {
    transport.mss = flags.mss;
    // A larger segment size would otherwise fall below the default initial window
    if (transport.initialCongestionWindow === undefined) {
      transport.initialCongestionWindow = flags.mss;
    }
  }
  if (flags.window !== undefined) {
    transport.maxReceiveWindow = flags.window;
  }

  const fromFlags: Partial<NetworkConditions> = {
    lossRate: flags.loss,
    duplicateRate: flags.duplicate,
    reorderRate: flags.reorder,
    reorderDelay: flags.reorderDelay,
    corruptRate: flags.corrupt,
    refuseRate: flags.refuse,
    latency: flags.latency,
    jitter: flags.jitter,
    queueCapacity: flags.queue,
  };

  const network: Partial<NetworkConditions> = {};
  for (const key of NETWORK_KEYS) {
    const value = fromFlags[key] ?? file.network[key];
    if (value !== undefined) {
      network[key] = checkNetworkValue(key, requireNumber(value, key));
    }
  }

  if (flags.bytes !== undefined && (!Number.isInteger(flags.bytes) || flags.bytes < 0)) {
    throw new ConfigError('bytes must be a non-negative integer', 'bytes');
  }
  if (flags.maxTime !== undefined && !(flags.maxTime > 0)) {
    throw new ConfigError('maxTime must be positive', 'maxTime');
  }

  return {
    bytes: flags.bytes,
    seed: flags.seed,
    maxTime: flags.maxTime,
    config: resolveConfig(transport),
    network,
  };
}
