/**
 * Demo script loading
 */

import * as fs from 'fs';

import { DEFAULT_COMMENT_MARKER } from '../utils/constants.js';
import type { DemoScript, LoadScriptOptions } from './types.js';

/**
 * Split file content into lines, dropping CRs and the empty line
 * left by a terminating newline
 */
export function splitScriptLines(content: string): string[] {
  if (content === '') return [];
  const lines = content.split('\n').map((line) => line.replace(/\r$/, ''));
  if (lines[lines.length - 1] === '') {
    lines.pop();
  }
  return lines;
}

/**
 * Build a script from in-memory lines, appending the trailer once
 */
export function createDemoScript(
  file: string,
  realLines: readonly string[],
  options: LoadScriptOptions
): DemoScript {
  return {
    file,
    lines: [...realLines, options.trailer],
    lineCount: realLines.length,
    commentMarker: options.commentMarker ?? DEFAULT_COMMENT_MARKER,
  };
}

/**
 * Load a demo script file
 */
export function loadDemoScript(
  scriptFile: string,
  options: LoadScriptOptions
): DemoScript {
  if (!fs.existsSync(scriptFile)) {
    throw new Error(`Script not found: ${scriptFile}`);
  }

  const content = fs.readFileSync(scriptFile, 'utf-8');
  return createDemoScript(scriptFile, splitScriptLines(content), options);
}
