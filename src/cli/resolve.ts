/**
 * Script path resolution with operator reprompt
 */

import * as fs from 'fs';

import { errorMessage } from '../output/colors.js';
import type { Terminal } from '../terminal/types.js';

/**
 * Ask for another path until one exists
 */
export async function resolveScriptPath(
  terminal: Terminal,
  initial: string,
  exists: (file: string) => boolean = fs.existsSync
): Promise<string> {
  let file = initial;
  while (!exists(file)) {
    terminal.writeLine(errorMessage(`Script not found: ${file}`));
    file = (await terminal.readLine('Script file: ')).trim();
  }
  return file;
}
