/**
 * Engine configuration module.
 *
 * Exports default configuration values and utilities for
 * merging and validating transport configuration.
 *
 * @module engine/config
 */

export { DEFAULT_CONFIG, CONFIG_KEYS, mergeWithDefaults, validateConfig, resolveConfig } from './defaults.js';
