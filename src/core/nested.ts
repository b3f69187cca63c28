/**
 * Nested prompt entered by Suspend
 */

import { colorize } from '../output/colors.js';
import { executeText, type PlayerContext, printStatus } from './context.js';

/** Leaves the current nested prompt */
export const EXIT_COMMAND = 'exit';
/** Opens a deeper nested prompt */
export const SUSPEND_COMMAND = 'suspend';

/**
 * Prompt for `>` repeated once per level, plus one
 */
export function nestedPrompt(depth: number): string {
  return '>'.repeat(depth + 1);
}

/**
 * Read and execute lines until the operator types "exit".
 * "suspend" recurses one level deeper.
 */
export async function runNestedPrompt(
  ctx: PlayerContext,
  depth = 1
): Promise<void> {
  const { terminal, config, logger } = ctx;

  logger.logEvent({ event: 'suspend', depth });
  printStatus(
    ctx,
    `Suspended at level ${depth}. Type "${EXIT_COMMAND}" to resume, "${SUSPEND_COMMAND}" to nest.`
  );

  const prompt = colorize(nestedPrompt(depth), config.colors.prompt) + ' ';
  let input = (await terminal.readLine(prompt)).trim();

  while (input !== EXIT_COMMAND) {
    if (input === SUSPEND_COMMAND) {
      await runNestedPrompt(ctx, depth + 1);
    } else if (input !== '') {
      await executeText(ctx, input, null);
    }
    input = (await terminal.readLine(prompt)).trim();
  }

  logger.logEvent({ event: 'resume', depth });
  printStatus(ctx, depth > 1 ? `Back to level ${depth - 1}` : 'Resuming demo');
}
