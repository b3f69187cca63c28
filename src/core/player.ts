/**
 * Demo player loop - displays one line at a time and acts on keystrokes
 */

import {
  colorize,
  colors,
  demoMessage,
  formatElapsed,
} from '../output/colors.js';
import type { DemoSummary, PlayMode } from '../types/player.js';
import { MS_PER_SECOND, TRUNCATE_TITLE_LINE } from '../utils/constants.js';
import { previewLine } from '../utils/formatting.js';
import {
  elapsedMs,
  executeText,
  type PlayerContext,
  printStatus,
} from './context.js';
import {
  helpLegend,
  type PlayerCommand,
  resolveCommand,
  UNRECOGNIZED_HINT,
} from './keys.js';
import {
  findLines,
  goToLine,
  isCommentLine,
  isFinished,
  parseInterval,
  parseLineNumber,
  rewind,
  trailerIndex,
} from './navigation.js';
import { runNestedPrompt } from './nested.js';

/**
 * Mutable loop state
 */
export interface PlayerState {
  /** Index of the next line to display */
  cursor: number;
  mode: PlayMode;
  intervalMs: number;
  executed: number;
  failed: number;
  quit: boolean;
}

export function createPlayerState(ctx: PlayerContext): PlayerState {
  const { autoPlaySeconds, startLine } = ctx.config;
  return {
    cursor: startLine,
    mode: autoPlaySeconds === null ? 'manual' : 'auto',
    intervalMs: (autoPlaySeconds ?? 0) * MS_PER_SECOND,
    executed: 0,
    failed: 0,
    quit: false,
  };
}

// ============================================================
// DISPLAY
// ============================================================

/**
 * Echo a command line after its prompt, typed out when a delay is set.
 * Leaves the cursor at the end of the line.
 */
async function displayLine(
  ctx: PlayerContext,
  index: number,
  text: string
): Promise<void> {
  const { terminal, config } = ctx;

  terminal.setTitle(
    `demo-player [${formatElapsed(elapsedMs(ctx))}] ${index}: ${previewLine(text, TRUNCATE_TITLE_LINE)}`
  );
  terminal.write(colorize(`[${index}] >`, config.colors.prompt) + ' ');

  if (config.typingDelayMs <= 0) {
    terminal.write(colorize(text, config.colors.command));
    return;
  }

  terminal.write(colors[config.colors.command]);
  for (const char of text) {
    terminal.write(char);
    await terminal.sleep(config.typingDelayMs);
  }
  terminal.write(colors.reset);
}

function viewSource(ctx: PlayerContext, current: number): void {
  const { script, terminal, config } = ctx;
  printStatus(ctx, `${script.file} (${script.lineCount} lines)`);
  for (let index = 0; index < script.lineCount; index++) {
    const label = `[${index}] ${script.lines[index] ?? ''}`;
    if (index === current) {
      terminal.writeLine(`${colors.inverse}> ${label}${colors.reset}`);
    } else if (isCommentLine(script, index)) {
      terminal.writeLine(`  ${colorize(label, config.colors.comment)}`);
    } else {
      terminal.writeLine(`  ${label}`);
    }
  }
}

// ============================================================
// COMMANDS
// ============================================================

async function runLine(
  ctx: PlayerContext,
  state: PlayerState,
  index: number
): Promise<void> {
  const ok = await executeText(ctx, ctx.script.lines[index] ?? '', index);
  // The trailer is a no-op; only real lines count
  if (index === trailerIndex(ctx.script)) {
    return;
  }
  state.executed++;
  if (!ok) {
    state.failed++;
  }
}

async function prompt(ctx: PlayerContext, label: string): Promise<string> {
  return ctx.terminal.readLine(
    colorize(label, ctx.config.colors.prompt) + ' '
  );
}

/**
 * Act on one command for the line at `index`
 *
 * @returns Cursor of the next line to display
 */
export async function handleCommand(
  ctx: PlayerContext,
  state: PlayerState,
  command: PlayerCommand,
  index: number
): Promise<number> {
  const { script, terminal, config, logger } = ctx;

  switch (command) {
    case 'help':
      printStatus(ctx, 'Keys:');
      for (const line of helpLegend()) {
        terminal.writeLine(line);
      }
      return index;

    case 'execute':
      await runLine(ctx, state, index);
      if (state.mode === 'manual' && !config.noPause) {
        await terminal.readKey();
      }
      return index + 1;

    case 'next':
      return index + 1;

    case 'previous': {
      const target = rewind(script, index);
      logger.logEvent({ event: 'navigate', from: index, to: target });
      return target;
    }

    case 'autoPlay': {
      const seconds = parseInterval(
        await prompt(ctx, 'Auto-play interval (seconds):')
      );
      if (seconds === null) return index;
      state.mode = 'auto';
      state.intervalMs = seconds * MS_PER_SECOND;
      logger.logEvent({ event: 'autoplay_start', line: index, seconds });
      return index;
    }

    case 'quit':
      state.quit = true;
      return script.lines.length;

    case 'viewSource':
      viewSource(ctx, index);
      return index;

    case 'timeCheck':
      printStatus(ctx, `Elapsed: ${formatElapsed(elapsedMs(ctx))}`);
      return index;

    case 'suspend':
      await runNestedPrompt(ctx);
      return index;

    case 'goTo': {
      const n = parseLineNumber(await prompt(ctx, 'Go to line:'));
      const target = n === null ? null : goToLine(script, n);
      if (target === null) return index;
      logger.logEvent({ event: 'navigate', from: index, to: target });
      return target;
    }

    case 'find': {
      const pattern = (await prompt(ctx, 'Find:')).trim();
      if (pattern === '') return index;
      const matches = findLines(script, pattern);
      if (matches.length === 0) {
        printStatus(ctx, `"${pattern}" not found`);
      }
      for (const match of matches) {
        terminal.writeLine(`  [${match.index}] ${match.text}`);
      }
      return index;
    }

    case 'clear':
      terminal.clear();
      return index;

    case 'unrecognized':
      terminal.writeLine(`${colors.dim}${UNRECOGNIZED_HINT}${colors.reset}`);
      return index;
  }
}

// ============================================================
// LOOP
// ============================================================

/**
 * Play the script from config.startLine until quit or past the trailer
 */
export async function runDemo(ctx: PlayerContext): Promise<DemoSummary> {
  const { script, terminal, config, logger } = ctx;
  const state = createPlayerState(ctx);

  logger.logEvent({
    event: 'demo_start',
    file: script.file,
    lines: script.lineCount,
    start: state.cursor,
    engine: ctx.executor.name,
  });

  while (!isFinished(script, state.cursor)) {
    const index = state.cursor;
    const text = script.lines[index] ?? '';

    if (isCommentLine(script, index)) {
      terminal.writeLine(colorize(text, config.colors.comment));
      state.cursor = index + 1;
      continue;
    }

    await displayLine(ctx, index, text);

    if (state.mode === 'auto') {
      await terminal.sleep(state.intervalMs);
      terminal.writeLine();
      await runLine(ctx, state, index);
      state.cursor = index + 1;
      continue;
    }

    const key = await terminal.readKey();
    terminal.writeLine();
    state.cursor = await handleCommand(ctx, state, resolveCommand(key), index);
  }

  const summary: DemoSummary = {
    executed: state.executed,
    failed: state.failed,
    elapsedMs: elapsedMs(ctx),
    quit: state.quit,
  };

  terminal.writeLine(
    demoMessage(
      `Demo ${state.quit ? 'stopped' : 'complete'}: ${summary.executed} executed, ${summary.failed} failed in ${formatElapsed(summary.elapsedMs)}`
    )
  );
  logger.logEvent({ event: 'demo_complete', ...summary });

  return summary;
}
