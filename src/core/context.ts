/**
 * Player context and line execution shared by the loop and the nested prompt
 */

import { demoMessage, errorMessage, formatDuration } from '../output/colors.js';
import type { Logger } from '../output/logger.js';
import type { DemoScript } from '../script/types.js';
import type { Terminal } from '../terminal/types.js';
import type { PlayerConfig } from '../types/player.js';
import { TRUNCATE_PREVIEW } from '../utils/constants.js';
import { previewLine } from '../utils/formatting.js';
import type { CommandExecutor } from './executor.js';

/**
 * Everything the loop needs, built once at startup
 */
export interface PlayerContext {
  config: PlayerConfig;
  script: DemoScript;
  terminal: Terminal;
  executor: CommandExecutor;
  logger: Logger;
  /** Session clock start, in ms */
  startTime: number;
  /** Clock used for elapsed time */
  now: () => number;
}

export interface PlayerContextOptions {
  config: PlayerConfig;
  script: DemoScript;
  terminal: Terminal;
  executor: CommandExecutor;
  logger: Logger;
  now?: (() => number) | undefined;
  /** Session clock start; defaults to now() */
  startTime?: number | undefined;
}

export function createPlayerContext(
  options: PlayerContextOptions
): PlayerContext {
  const now = options.now ?? Date.now;
  return {
    config: options.config,
    script: options.script,
    terminal: options.terminal,
    executor: options.executor,
    logger: options.logger,
    startTime: options.startTime ?? now(),
    now,
  };
}

/**
 * Milliseconds since the session started
 */
export function elapsedMs(ctx: PlayerContext): number {
  return ctx.now() - ctx.startTime;
}

/**
 * Execute text through the context's executor and print the outcome.
 * Failures are reported, never thrown.
 *
 * @param line - Script index, or null for nested-prompt input
 * @returns Whether the line succeeded
 */
export async function executeText(
  ctx: PlayerContext,
  text: string,
  line: number | null
): Promise<boolean> {
  const { terminal, logger } = ctx;
  const started = ctx.now();
  const preview = previewLine(text, TRUNCATE_PREVIEW);

  try {
    const result = await ctx.executor.execute(text);
    const output = result.output.replace(/\n+$/, '');
    if (output !== '') {
      terminal.writeLine(output);
    }
    const duration = formatDuration(ctx.now() - started);

    if (result.exitCode !== 0) {
      terminal.writeLine(
        errorMessage(`Command exited with code ${result.exitCode}`)
      );
      logger.logEvent({
        event: 'line_error',
        line,
        text: preview,
        exit: result.exitCode,
        duration,
      });
      return false;
    }

    logger.logEvent({ event: 'line_execute', line, text: preview, duration });
    return true;
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    terminal.writeLine(errorMessage(message));
    logger.logEvent({ event: 'line_error', line, text: preview, error: message });
    return false;
  }
}

/**
 * Print a [DEMO] status line
 */
export function printStatus(ctx: PlayerContext, message: string): void {
  ctx.terminal.writeLine(demoMessage(message));
}
