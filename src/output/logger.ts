/**
 * Session log: plain output lines plus JSON player events
 */

import * as fs from 'fs';
import * as path from 'path';

import { stripAnsi } from './colors.js';

export type PlayerEventName =
  | 'demo_start'
  | 'line_execute'
  | 'line_error'
  | 'navigate'
  | 'autoplay_start'
  | 'suspend'
  | 'resume'
  | 'demo_complete';

/** Event fields supplied by the caller */
export type PlayerEventData = { event: PlayerEventName } & Record<
  string,
  unknown
>;

/** Event as written to the log file */
export type PlayerEvent = PlayerEventData & {
  type: 'player';
  timestamp: string;
};

export interface Logger {
  log(msg: string): void;
  logEvent(data: PlayerEventData): void;
  close(): void;
  filePath: string | null;
}

export interface LoggerOptions {
  enabled: boolean;
  logDir: string;
  /** Script being played; its base name prefixes the log file */
  scriptFile: string;
}

const disabledLogger: Logger = {
  log: () => undefined,
  logEvent: () => undefined,
  close: () => undefined,
  filePath: null,
};

/**
 * File name for a session log, e.g. intro-2026-03-01T10-20-30.log
 */
export function logFileName(scriptFile: string, startedAt: Date): string {
  const stamp = startedAt.toISOString().replace(/[:.]/g, '-').slice(0, 19);
  const base = path.basename(scriptFile, path.extname(scriptFile));
  return `${base}-${stamp}.log`;
}

export function createLogger(options: LoggerOptions): Logger {
  if (!options.enabled) {
    return disabledLogger;
  }

  if (!fs.existsSync(options.logDir)) {
    fs.mkdirSync(options.logDir, { recursive: true });
  }

  const logFile = path.join(
    options.logDir,
    logFileName(options.scriptFile, new Date())
  );
  const stream = fs.createWriteStream(logFile, { flags: 'a' });

  return {
    log(msg: string): void {
      stream.write(stripAnsi(msg) + '\n');
    },
    logEvent(data: PlayerEventData): void {
      const entry: PlayerEvent = {
        type: 'player',
        timestamp: new Date().toISOString(),
        ...data,
      };
      stream.write(JSON.stringify(entry) + '\n');
    },
    close(): void {
      stream.end();
    },
    filePath: logFile,
  };
}
