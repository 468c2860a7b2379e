/**
 * Shared formatting utilities for the CLI.
 *
 * These functions provide consistent formatting across all commands for
 * byte counts, rates, simulated durations and timestamps.
 */

import { SIMULATION_EPOCH } from '../../shared/constants.js';

/**
 * Formats bytes into a human-readable string with appropriate units.
 *
 * @param bytes - The number of bytes to format
 * @returns Formatted string (e.g., "3.1 GB", "256 KB", "0 B")
 */
export function formatBytes(bytes: number): string {
  if (bytes === 0) return '0 B';

  const units = ['B', 'KB', 'MB', 'GB', 'TB'];
  const base = 1024;

  const exponent = Math.floor(Math.log(bytes) / Math.log(base));
  const unitIndex = Math.min(exponent, units.length - 1);

  const value = bytes / Math.pow(base, unitIndex);

  if (unitIndex === 0) {
    return `${Math.round(value)} ${units[unitIndex]}`;
  }

  return `${value.toFixed(1)} ${units[unitIndex]}`;
}

/**
 * Formats a rate in bytes/second.
 *
 * @returns Formatted string (e.g., "2.10 MB/s", "256 KB/s")
 */
export function formatSpeed(bytesPerSecond: number): string {
  if (bytesPerSecond <= 0) return '0 B/s';

  const units = ['B/s', 'KB/s', 'MB/s', 'GB/s'];
  const base = 1024;

  const exponent = Math.floor(Math.log(bytesPerSecond) / Math.log(base));
  const unitIndex = Math.min(exponent, units.length - 1);

  const value = bytesPerSecond / Math.pow(base, unitIndex);

  if (value >= 100) {
    return `${Math.round(value)} ${units[unitIndex]}`;
  } else if (value >= 10) {
    return `${value.toFixed(1)} ${units[unitIndex]}`;
  } else {
    return `${value.toFixed(2)} ${units[unitIndex]}`;
  }
}

/**
 * Formats seconds into a human-readable duration string.
 *
 * @returns Formatted string (e.g., "12m 30s", "1h 30m")
 */
export function formatDuration(seconds: number): string {
  if (seconds < 0) {
    return '0s';
  }

  const secs = Math.floor(seconds % 60);
  const mins = Math.floor((seconds / 60) % 60);
  const hours = Math.floor(seconds / 3600);

  const parts: string[] = [];

  if (hours > 0) {
    parts.push(`${hours}h`);
  }
  if (mins > 0) {
    parts.push(`${mins}m`);
  }
  if (secs > 0 || parts.length === 0) {
    parts.push(`${secs}s`);
  }

  return parts.join(' ');
}

/**
 * Formats a simulated duration given in milliseconds.
 *
 * @returns "850 ms" below a second, "1.25 s" below a minute, otherwise
 * the {@link formatDuration} form
 */
export function formatMilliseconds(ms: number): string {
  if (ms < 1000) {
    return `${Math.round(ms)} ms`;
  }
  if (ms < 60_000) {
    return `${(ms / 1000).toFixed(2)} s`;
  }
  return formatDuration(ms / 1000);
}

/**
 * Formats a virtual clock reading for log display.
 *
 * Simulated time is anchored at {@link SIMULATION_EPOCH}, so runs print the
 * same timestamps every time.
 *
 * @param now - Simulated time in ms
 * @returns ISO timestamp (e.g., "2000-01-01T00:00:00.020Z")
 */
export function formatTimestamp(now: number): string {
  return new Date(SIMULATION_EPOCH + now).toISOString();
}

/**
 * Truncates a string to a maximum length, adding ellipsis if needed.
 */
export function truncateText(text: string, maxLength: number): string {
  if (text.length <= maxLength) {
    return text;
  }
  return text.slice(0, maxLength - 1) + '…'; // ellipsis
}
