/**
 * Player configuration and state types
 */

import type { ColorName } from '../output/colors.js';
import {
  DEFAULT_COMMENT_MARKER,
  DEFAULT_LOG_DIR,
  DEFAULT_TYPING_DELAY_MS,
} from '../utils/constants.js';

/**
 * Engine that executes script lines
 */
export type Engine = 'rill' | 'shell';

export const ENGINES: readonly Engine[] = ['rill', 'shell'];

/**
 * Whether the loop waits for a key on each line or plays on its own
 */
export type PlayMode = 'manual' | 'auto';

/**
 * The three configurable display colors
 */
export interface ColorScheme {
  prompt: ColorName;
  command: ColorName;
  comment: ColorName;
}

/**
 * Player configuration
 */
export interface PlayerConfig {
  /** Engine override; null picks one from the script extension */
  engine: Engine | null;
  /** 0-based index of the first line to display */
  startLine: number;
  /** Start in auto-play with this interval; null starts in manual mode */
  autoPlaySeconds: number | null;
  /** Skip the extra keystroke after executing a line */
  noPause: boolean;
  /** Delay between echoed characters in ms */
  typingDelayMs: number;
  commentMarker: string;
  colors: ColorScheme;
  /** Working directory for executed lines */
  cwd: string;
  enableLog: boolean;
  logDir: string;
}

export const DEFAULT_COLORS: ColorScheme = {
  prompt: 'yellow',
  command: 'cyan',
  comment: 'green',
};

/**
 * Default player configuration
 */
export const DEFAULT_CONFIG: PlayerConfig = {
  engine: null,
  startLine: 0,
  autoPlaySeconds: null,
  noPause: false,
  typingDelayMs: DEFAULT_TYPING_DELAY_MS,
  commentMarker: DEFAULT_COMMENT_MARKER,
  colors: DEFAULT_COLORS,
  cwd: process.cwd(),
  enableLog: true,
  logDir: DEFAULT_LOG_DIR,
};

/**
 * Parsed CLI arguments
 */
export interface ParsedArgs {
  /** Script path as given; may not exist yet */
  scriptFile: string;
  /** Arguments after `--`, exposed to the script as $ARGS */
  scriptArgs: string[];
  config: Partial<PlayerConfig>;
}

/**
 * Summary returned when the demo loop ends
 */
export interface DemoSummary {
  /** Lines executed, counting failures */
  executed: number;
  /** Lines that threw or exited non-zero */
  failed: number;
  elapsedMs: number;
  /** True when the operator quit before the end */
  quit: boolean;
}
