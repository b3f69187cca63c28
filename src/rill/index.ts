/**
 * Rill integration for the demo player
 */

export type { DemoContextOptions, ShellRunner } from './context.js';
export { createDemoContext, definedEnv } from './context.js';
export type { RillExecutorOptions } from './executor.js';
export { createRillExecutor, describeRillError } from './executor.js';

/**
 * Check if a file is a Rill script
 */
export function isRillScript(filename: string): boolean {
  return filename.endsWith('.rill');
}
