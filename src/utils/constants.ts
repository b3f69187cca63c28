/**
 * Centralized constants for the player
 * Replaces magic numbers with descriptive names
 */

// === Script ===
/** Default marker that starts a comment line */
export const DEFAULT_COMMENT_MARKER = '#';

// === Display Limits ===
/** Truncation length for the line text shown in the window title */
export const TRUNCATE_TITLE_LINE = 60;
/** Truncation length for line previews in log events */
export const TRUNCATE_PREVIEW = 50;

// === PTY Configuration ===
/** Terminal column width */
export const PTY_COLS = 120;
/** Terminal row count */
export const PTY_ROWS = 40;
/** Shell used when $SHELL is unset */
export const FALLBACK_SHELL = '/bin/sh';

// === Time Constants ===
/** Milliseconds per second */
export const MS_PER_SECOND = 1000;
/** Seconds per minute */
export const SECONDS_PER_MINUTE = 60;
/** Seconds per hour */
export const SECONDS_PER_HOUR = 3600;

// === Exit Codes ===
/** Exit code after Ctrl+C, following the 128 + SIGINT convention */
export const EXIT_INTERRUPTED = 130;

// === Default Configuration ===
/** Default delay between typed characters in ms (0 prints the line at once) */
export const DEFAULT_TYPING_DELAY_MS = 0;
/** Default directory for session logs */
export const DEFAULT_LOG_DIR = 'logs';
