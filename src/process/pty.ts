/**
 * Shell execution in a pseudo-terminal
 *
 * One shell process serves the whole demo, so a `cd`, variable or function
 * set up by one line is still there for the next. Each line is framed by
 * begin/end markers; the end marker carries the line's exit status.
 */

import type { IPty } from 'node-pty';
import * as pty from 'node-pty';

import {
  type CommandExecutor,
  ExecutionError,
  type ExecutionResult,
} from '../core/executor.js';
import type { Logger } from '../output/logger.js';
import { FALLBACK_SHELL, PTY_COLS, PTY_ROWS } from '../utils/constants.js';

const BEGIN_MARKER = '__demo_player_begin';
const END_MARKER = '__demo_player_end';

/**
 * Written once after spawn: no echo, no line editing, no prompts.
 * Errors from options the shell lacks are discarded.
 */
export const SESSION_SETUP =
  "stty -echo 2>/dev/null; set +o emacs +o vi 2>/dev/null; unsetopt zle 2>/dev/null; PS1=''; PS2=''; PROMPT_COMMAND=''\n";

/**
 * Frame a command line with markers.
 * The markers are assembled by printf so an echoed command never matches.
 */
export function wrapCommand(id: number, command: string): string {
  return (
    [
      `printf '%s_%s\\n' ${BEGIN_MARKER} ${id}`,
      command,
      `printf '\\n%s_%s:%s\\n' ${END_MARKER} ${id} "$?"`,
    ].join('\n') + '\n'
  );
}

export interface TakenResult {
  result: ExecutionResult;
  /** Output left after the end marker */
  rest: string;
}

/**
 * Pull the result of command `id` out of buffered session output
 *
 * @returns null until both markers have arrived
 */
export function takeCommandResult(
  buffer: string,
  id: number
): TakenResult | null {
  const text = buffer.replace(/\r\n/g, '\n');
  const begin = `${BEGIN_MARKER}_${id}\n`;
  const start = text.indexOf(begin);
  if (start === -1) {
    return null;
  }

  const bodyStart = start + begin.length;
  const body = text.slice(bodyStart);
  const end = new RegExp(`\\n${END_MARKER}_${id}:(\\d+)\\n`).exec(body);
  if (!end) {
    return null;
  }

  return {
    result: { output: body.slice(0, end.index), exitCode: Number(end[1]) },
    rest: body.slice(end.index + end[0].length),
  };
}

export interface ShellExecutorOptions {
  cwd: string;
  logger: Logger;
  /** Defaults to $SHELL, then /bin/sh */
  shell?: string | undefined;
}

interface PendingCommand {
  id: number;
  resolve: (result: ExecutionResult) => void;
  reject: (error: Error) => void;
}

/**
 * Executor that hands each line to a long-lived shell.
 * The shell starts on the first line and again after it exits.
 */
export function createShellExecutor(
  options: ShellExecutorOptions
): CommandExecutor {
  const { cwd, logger } = options;
  const shell = options.shell ?? process.env['SHELL'] ?? FALLBACK_SHELL;

  let session: IPty | null = null;
  let buffer = '';
  let lastId = 0;
  let pending: PendingCommand | null = null;

  function settle(): void {
    if (!pending) return;
    const taken = takeCommandResult(buffer, pending.id);
    if (!taken) return;

    const current = pending;
    pending = null;
    buffer = taken.rest;
    logger.log(taken.result.output);
    current.resolve(taken.result);
  }

  function start(): IPty {
    if (session) return session;

    const ptyProcess: IPty = pty.spawn(shell, [], {
      name: 'xterm-256color',
      cols: PTY_COLS,
      rows: PTY_ROWS,
      cwd,
      env: { ...process.env },
    });

    ptyProcess.onData((data: string) => {
      buffer += data;
      settle();
    });

    ptyProcess.onExit(({ exitCode }) => {
      if (session === ptyProcess) {
        session = null;
        buffer = '';
      }
      const current = pending;
      pending = null;
      current?.reject(
        new ExecutionError(`Shell session exited with code ${exitCode}`)
      );
    });

    ptyProcess.write(SESSION_SETUP);
    session = ptyProcess;
    return ptyProcess;
  }

  return {
    name: 'shell',
    noop: 'true',
    execute(text: string): Promise<ExecutionResult> {
      if (pending) {
        return Promise.reject(
          new ExecutionError('Shell session is busy with another line')
        );
      }
      const ptyProcess = start();
      const id = ++lastId;
      return new Promise((resolve, reject) => {
        pending = { id, resolve, reject };
        ptyProcess.write(wrapCommand(id, text));
      });
    },
    dispose(): void {
      const ptyProcess = session;
      const current = pending;
      session = null;
      pending = null;
      buffer = '';
      ptyProcess?.kill();
      current?.reject(new ExecutionError('Shell session closed'));
    },
  };
}
