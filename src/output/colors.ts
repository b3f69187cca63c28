/**
 * ANSI color codes for terminal output
 */

import {
  MS_PER_SECOND,
  SECONDS_PER_HOUR,
  SECONDS_PER_MINUTE,
} from '../utils/constants.js';

export const colors = {
  reset: '\x1b[0m',
  dim: '\x1b[2m',
  bold: '\x1b[1m',
  inverse: '\x1b[7m',
  white: '\x1b[37m',
  cyan: '\x1b[36m',
  yellow: '\x1b[33m',
  green: '\x1b[32m',
  red: '\x1b[31m',
  magenta: '\x1b[35m',
  blue: '\x1b[34m',
} as const;

export type ColorName = keyof typeof colors;

export function isColorName(value: string): value is ColorName {
  return Object.prototype.hasOwnProperty.call(colors, value);
}

/**
 * Strip ANSI escape codes from a string
 */
// eslint-disable-next-line no-control-regex -- ANSI escape codes require control characters
const ANSI_REGEX = /\x1b\[[0-9;]*[a-zA-Z]/g;

export function stripAnsi(str: string): string {
  return str.replace(ANSI_REGEX, '');
}

/**
 * Apply color to a string
 */
export function colorize(text: string, color: ColorName): string {
  return `${colors[color]}${text}${colors.reset}`;
}

/**
 * Format duration in human-readable form
 * Examples: 450ms, 2.5s, 1m30s, 1h2m3s
 */
export function formatDuration(ms: number): string {
  if (ms < MS_PER_SECOND) {
    return `${ms}ms`;
  }
  const totalSeconds = ms / MS_PER_SECOND;
  if (totalSeconds < SECONDS_PER_MINUTE) {
    return `${totalSeconds.toFixed(1)}s`;
  }
  return formatElapsed(ms);
}

/**
 * Format wall-clock time in whole seconds, omitting zero-valued leading units
 * Examples: 0s, 42s, 2m5s, 1h0m5s
 */
export function formatElapsed(ms: number): string {
  const totalSeconds = Math.max(0, Math.floor(ms / MS_PER_SECOND));
  const hours = Math.floor(totalSeconds / SECONDS_PER_HOUR);
  const mins = Math.floor((totalSeconds % SECONDS_PER_HOUR) / SECONDS_PER_MINUTE);
  const secs = totalSeconds % SECONDS_PER_MINUTE;
  if (hours > 0) {
    return `${hours}h${mins}m${secs}s`;
  }
  if (mins > 0) {
    return `${mins}m${secs}s`;
  }
  return `${secs}s`;
}

/**
 * Build a [DEMO] status line
 */
export function demoMessage(message: string): string {
  return `${colors.magenta}[DEMO]${colors.reset} ${message}`;
}

/**
 * Build an error line for a failed execution
 */
export function errorMessage(message: string): string {
  return `${colors.red}Error:${colors.reset} ${message}`;
}
