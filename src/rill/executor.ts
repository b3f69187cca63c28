/**
 * Rill line executor
 *
 * Every line of a demo is parsed and executed against one shared
 * runtime context, so host functions and variables stay available
 * from line to line.
 */

import type { RillValue, RuntimeContext } from '@rcrsr/rill';
import { execute, parse, ParseError, RuntimeError } from '@rcrsr/rill';

import {
  type CommandExecutor,
  ExecutionError,
  type ExecutionResult,
} from '../core/executor.js';
import { demoMessage } from '../output/colors.js';
import type { Logger } from '../output/logger.js';
import type { Terminal } from '../terminal/types.js';
import { formatRillValue } from '../utils/formatting.js';
import { createDemoContext, type ShellRunner } from './context.js';

export interface RillExecutorOptions {
  terminal: Terminal;
  logger: Logger;
  runShell: ShellRunner;
  elapsedSeconds: () => number;
  rawArgs?: string[] | undefined;
  scriptFile?: string | undefined;
}

/**
 * Turn a Rill error into a display message
 */
export function describeRillError(error: unknown): string {
  if (error instanceof ParseError) {
    const location = error.location
      ? ` at line ${error.location.line}:${error.location.column}`
      : '';
    return `Parse error${location}: ${error.message}`;
  }
  if (error instanceof RuntimeError) {
    const location = error.location
      ? ` at line ${error.location.line}:${error.location.column}`
      : '';
    return `Runtime error${location}: ${error.message}`;
  }
  return error instanceof Error ? error.message : String(error);
}

/**
 * Create an executor that evaluates lines as Rill
 */
export function createRillExecutor(
  options: RillExecutorOptions
): CommandExecutor {
  const { terminal, logger, runShell, elapsedSeconds, rawArgs, scriptFile } =
    options;

  const ctx: RuntimeContext = createDemoContext({
    runShell,
    elapsedSeconds,
    rawArgs,
    scriptFile,
    callbacks: {
      onLog: (value: RillValue) => {
        const text = formatRillValue(value);
        terminal.writeLine(demoMessage(text));
        logger.log(`[LOG] ${text}`);
      },
    },
  });

  return {
    name: 'rill',
    noop: '""',
    async execute(text: string): Promise<ExecutionResult> {
      try {
        const ast = parse(text);
        const result = await execute(ast, ctx);
        return { output: formatRillValue(result.value), exitCode: 0 };
      } catch (error) {
        throw new ExecutionError(describeRillError(error), { cause: error });
      }
    },
    dispose: () => undefined,
  };
}
