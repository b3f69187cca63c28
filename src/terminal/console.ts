/**
 * Terminal backed by process.stdin/stdout
 */

import * as readline from 'readline';

import { ENTER_KEY } from '../core/keys.js';
import { InterruptError, type Terminal } from './types.js';

const CLEAR_SCREEN = '\x1b[2J\x1b[H';

/**
 * Normalize a keypress to the key names the player binds
 */
export function normalizeKey(
  str: string | undefined,
  key: readline.Key | undefined
): string {
  if (key?.name === 'return' || key?.name === 'enter') return ENTER_KEY;
  if (str === '\r' || str === '\n') return ENTER_KEY;
  return str ?? key?.name ?? '';
}

function isInterrupt(key: readline.Key | undefined): boolean {
  return key?.ctrl === true && key.name === 'c';
}

/** Keystroke source; process.stdin in production */
export interface TerminalInput extends NodeJS.ReadableStream {
  isTTY?: boolean | undefined;
  setRawMode?: ((mode: boolean) => unknown) | undefined;
}

/** Output sink; process.stdout in production */
export interface TerminalOutput extends NodeJS.WritableStream {
  isTTY?: boolean | undefined;
}

/** Keystroke waiting to be read */
interface KeyEvent {
  name: string;
  interrupt: boolean;
}

interface KeyWaiter {
  resolve: (key: string) => void;
  reject: (error: Error) => void;
}

function deliver(waiter: KeyWaiter, event: KeyEvent): void {
  if (event.interrupt) {
    waiter.reject(new InterruptError());
  } else {
    waiter.resolve(event.name);
  }
}

export function createConsoleTerminal(
  input: TerminalInput = process.stdin,
  output: TerminalOutput = process.stdout
): Terminal {
  readline.emitKeypressEvents(input);

  const setRaw = (raw: boolean): void => {
    if (input.isTTY && input.setRawMode) {
      input.setRawMode(raw);
    }
  };

  // Keys typed ahead of the next readKey() queue up here
  const queued: KeyEvent[] = [];
  let waiter: KeyWaiter | null = null;
  let inputEnded = false;
  let readingLine = false;

  const onKeypress = (
    str: string | undefined,
    key: readline.Key | undefined
  ): void => {
    if (readingLine) return;
    const event: KeyEvent = {
      name: normalizeKey(str, key),
      interrupt: isInterrupt(key),
    };
    const current = waiter;
    if (!current) {
      queued.push(event);
      return;
    }
    waiter = null;
    setRaw(false);
    input.pause();
    deliver(current, event);
  };

  const onEnd = (): void => {
    inputEnded = true;
    const current = waiter;
    waiter = null;
    current?.reject(new InterruptError('Input closed'));
  };

  input.on('keypress', onKeypress);
  input.on('end', onEnd);
  input.pause();

  return {
    write(text: string): void {
      output.write(text);
    },

    writeLine(text = ''): void {
      output.write(text + '\n');
    },

    readKey(): Promise<string> {
      return new Promise((resolve, reject) => {
        const next = queued.shift();
        if (next) {
          deliver({ resolve, reject }, next);
          return;
        }
        if (inputEnded) {
          reject(new InterruptError('Input closed'));
          return;
        }
        waiter = { resolve, reject };
        setRaw(true);
        input.resume();
      });
    },

    readLine(prompt: string): Promise<string> {
      return new Promise((resolve, reject) => {
        readingLine = true;
        const rl = readline.createInterface({
          input,
          output,
          terminal: input.isTTY === true,
        });
        let answered = false;

        rl.once('close', () => {
          readingLine = false;
          if (!answered) {
            reject(new InterruptError('Input closed'));
          }
        });
        rl.once('SIGINT', () => {
          rl.close();
        });
        rl.question(prompt, (answer) => {
          answered = true;
          rl.close();
          resolve(answer);
        });
      });
    },

    clear(): void {
      output.write(CLEAR_SCREEN);
    },

    setTitle(title: string): void {
      if (output.isTTY === true) {
        output.write(`\x1b]0;${title}\x07`);
      }
    },

    sleep(ms: number): Promise<void> {
      return new Promise((resolve) => setTimeout(resolve, ms));
    },

    close(): void {
      input.removeListener('keypress', onKeypress);
      input.removeListener('end', onEnd);
      setRaw(false);
      input.pause();
    },
  };
}
