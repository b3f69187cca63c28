/**
 * Engine selection and executor construction
 */

import type { Logger } from '../output/logger.js';
import { createShellExecutor } from '../process/pty.js';
import { createRillExecutor, isRillScript } from '../rill/index.js';
import type { Terminal } from '../terminal/types.js';
import type { Engine } from '../types/player.js';
import type { CommandExecutor } from './executor.js';

export interface ExecutorOptions {
  terminal: Terminal;
  logger: Logger;
  cwd: string;
  scriptFile: string;
  scriptArgs: string[];
  elapsedSeconds: () => number;
}

/**
 * Engine to use: the configured one, else rill for .rill files, else shell
 */
export function selectEngine(configured: Engine | null, file: string): Engine {
  if (configured) return configured;
  return isRillScript(file) ? 'rill' : 'shell';
}

export function createExecutor(
  engine: Engine,
  options: ExecutorOptions
): CommandExecutor {
  const shell = createShellExecutor({
    cwd: options.cwd,
    logger: options.logger,
  });

  if (engine === 'shell') {
    return shell;
  }

  const rill = createRillExecutor({
    terminal: options.terminal,
    logger: options.logger,
    runShell: (command) => shell.execute(command),
    elapsedSeconds: options.elapsedSeconds,
    rawArgs: options.scriptArgs,
    scriptFile: options.scriptFile,
  });

  // demo::shell lines share the shell session, which closes with rill
  return {
    ...rill,
    dispose(): void {
      rill.dispose();
      shell.dispose();
    },
  };
}
