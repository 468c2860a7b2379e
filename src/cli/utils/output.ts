/**
 * CLI output utilities for rtsim commands.
 *
 * Provides shared formatting and output helpers for consistent
 * command-line output across all CLI commands.
 *
 * @module cli/utils/output
 */

import { ConnectionState } from '../../engine/types.js';
import {
  formatBytes,
  formatSpeed,
  formatDuration,
  formatMilliseconds,
  formatTimestamp,
  truncateText,
} from './format.js';

// Re-export formatting utilities for convenience
export {
  formatBytes,
  formatSpeed,
  formatDuration,
  formatMilliseconds,
  formatTimestamp,
  truncateText,
};

// =============================================================================
// Colors and State Names
// =============================================================================

/**
 * ANSI color codes for terminal output
 */
export const ansiColors = {
  reset: '\x1b[0m',
  bold: '\x1b[1m',
  dim: '\x1b[2m',

  // Foreground colors
  red: '\x1b[31m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
  blue: '\x1b[34m',
  magenta: '\x1b[35m',
  cyan: '\x1b[36m',
  white: '\x1b[37m',
  gray: '\x1b[90m',
} as const;

/**
 * Map connection states to display names
 */
export const stateNames: Record<ConnectionState, string> = {
  [ConnectionState.Closed]: 'CLOSED',
  [ConnectionState.SynSent]: 'SYN_SENT',
  [ConnectionState.SynReceived]: 'SYN_RECEIVED',
  [ConnectionState.Established]: 'ESTABLISHED',
  [ConnectionState.FinWait]: 'FIN_WAIT',
  [ConnectionState.CloseWait]: 'CLOSE_WAIT',
  [ConnectionState.Closing]: 'CLOSING',
  [ConnectionState.LastAck]: 'LAST_ACK',
  [ConnectionState.TimeWait]: 'TIME_WAIT',
};

/**
 * Apply ANSI color to text
 */
export function colorize(text: string, color: string): string {
  return `${color}${text}${ansiColors.reset}`;
}

// =============================================================================
// Padding
// =============================================================================

/**
 * Pad text to a fixed width, truncating it when too long
 */
export function padText(text: string, width: number): string {
  const truncated = text.length > width ? truncateText(text, width) : text;
  return truncated.padEnd(width);
}

// =============================================================================
// Message Formatting
// =============================================================================

/**
 * Format a success message
 */
export function successMessage(message: string): string {
  return colorize(`[OK] ${message}`, ansiColors.green);
}

/**
 * Format an error message
 */
export function errorMessage(message: string): string {
  return colorize(`[ERROR] ${message}`, ansiColors.red);
}

/**
 * Format a warning message
 */
export function warnMessage(message: string): string {
  return colorize(`[WARN] ${message}`, ansiColors.yellow);
}

/**
 * Prefix a message with the virtual timestamp it happened at
 */
export function logLine(now: number, message: string): string {
  return `[${formatTimestamp(now)}] ${message}`;
}

// =============================================================================
// Key-Value Display
// =============================================================================

/**
 * Format a key-value pair for display
 */
export function formatKeyValue(key: string, value: string, keyWidth: number = 18): string {
  return `${colorize(padText(key + ':', keyWidth), ansiColors.dim)} ${value}`;
}

/**
 * Format multiple key-value pairs as a block
 */
export function formatInfoBlock(pairs: Array<[string, string]>, keyWidth: number = 18): string {
  return pairs.map(([key, value]) => formatKeyValue(key, value, keyWidth)).join('\n');
}
