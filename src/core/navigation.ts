/**
 * Cursor arithmetic for the demo loop
 *
 * Cursors here are the index of the next line to display. 0 stands for
 * "before the first line" and script.lines.length for "ended".
 */

import type { DemoScript, LineMatch } from '../script/types.js';

/**
 * Index of the synthetic trailer line
 */
export function trailerIndex(script: DemoScript): number {
  return script.lines.length - 1;
}

/**
 * Whether the line at index is shown but never executed.
 * Empty lines and lines starting with the comment marker qualify;
 * the trailer never does.
 */
export function isCommentLine(script: DemoScript, index: number): boolean {
  if (index === trailerIndex(script)) return false;
  const line = script.lines[index];
  if (line === undefined) return false;
  const trimmed = line.trim();
  return trimmed === '' || trimmed.startsWith(script.commentMarker);
}

/**
 * Whether the loop has moved past the trailer
 */
export function isFinished(script: DemoScript, cursor: number): boolean {
  return cursor >= script.lines.length;
}

/**
 * Move back `steps` non-comment lines from `from`.
 * Falls back to `from` when the beginning is reached first.
 */
export function rewind(script: DemoScript, from: number, steps = 1): number {
  let index = from;
  let remaining = steps;
  while (remaining > 0) {
    index--;
    if (index < 0) return from;
    if (!isCommentLine(script, index)) {
      remaining--;
    }
  }
  return index;
}

/**
 * Cursor for "go to line N", or null when N is out of range.
 * N <= 0 restarts from the first line; 1..lineCount lands on index N.
 */
export function goToLine(script: DemoScript, n: number): number | null {
  if (!Number.isInteger(n)) return null;
  if (n <= 0) return 0;
  if (n > script.lineCount) return null;
  return n;
}

/**
 * Parse operator input for go-to; null when it is not an integer
 */
export function parseLineNumber(input: string): number | null {
  const trimmed = input.trim();
  if (!/^[-+]?\d+$/.test(trimmed)) return null;
  return Number.parseInt(trimmed, 10);
}

/**
 * Parse an auto-play interval in seconds; null when not a finite number >= 0
 */
export function parseInterval(input: string): number | null {
  const trimmed = input.trim();
  if (trimmed === '') return null;
  const seconds = Number(trimmed);
  if (!Number.isFinite(seconds) || seconds < 0) return null;
  return seconds;
}

/**
 * Real lines containing `pattern`, case-insensitive
 */
export function findLines(script: DemoScript, pattern: string): LineMatch[] {
  const needle = pattern.toLowerCase();
  const matches: LineMatch[] = [];
  for (let index = 0; index < script.lineCount; index++) {
    const text = script.lines[index];
    if (text !== undefined && text.toLowerCase().includes(needle)) {
      matches.push({ index, text });
    }
  }
  return matches;
}
