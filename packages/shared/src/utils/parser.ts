import msLib from 'ms';
import bytesLib from 'bytes';
import { format } from 'date-fns';

/**
 * Parse a duration string to milliseconds.
 * Supports: '250ms', '1s', '2m', etc.
 */
export function parseDuration(value: string | number): number {
  if (typeof value === 'number') return value;

  const result = msLib(value);
  if (result === undefined) {
    throw new Error(`Invalid duration string: "${value}"`);
  }
  return result;
}

/**
 * Format an elapsed wall-clock time with millisecond precision.
 */
export function formatElapsed(ms: number): string {
  if (ms < 1000) return `${Math.round(ms)}ms`;
  if (ms < 60_000) return `${(ms / 1000).toFixed(3)}s`;
  const minutes = Math.floor(ms / 60_000);
  const seconds = (ms - minutes * 60_000) / 1000;
  return `${minutes}m${seconds.toFixed(3)}s`;
}

/**
 * Format bytes to a human-readable string (binary multiples).
 */
export function formatBytes(value: number): string {
  return bytesLib.format(value, { unitSeparator: ' ' }) ?? '0 B';
}

export function formatPercent(value: number): string {
  return `${value.toFixed(2)}%`;
}

export function formatTimestamp(date: Date): string {
  return format(date, 'MMM dd HH:mm:ss.SSS');
}
