/**
 * Shared formatting utilities
 */

import type { RillValue } from '@rcrsr/rill';

/**
 * Format a Rill value for display
 */
export function formatRillValue(value: RillValue): string {
  if (value === null) return '';
  if (typeof value === 'string') return value;
  if (typeof value === 'number' || typeof value === 'boolean') {
    return String(value);
  }
  return JSON.stringify(value);
}

/**
 * Collapse a line to a single-line preview for titles and log events
 */
export function previewLine(text: string, maxLength: number): string {
  const cleaned = text.replace(/[\r\n]+/g, ' ').trim();
  return cleaned.length > maxLength
    ? cleaned.slice(0, maxLength) + '...'
    : cleaned;
}
