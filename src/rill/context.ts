/**
 * Demo Player - Rill Runtime Context
 * Provides host functions for demo scripts written in Rill
 */

import {
  type CallableFn,
  createRuntimeContext,
  type HostFunctionDefinition,
  type RillValue,
  type RuntimeCallbacks,
  type RuntimeContext,
} from '@rcrsr/rill';
import * as fs from 'fs';

import type { ExecutionResult } from '../core/executor.js';
import { formatRillValue } from '../utils/formatting.js';

// ============================================================
// TYPES
// ============================================================

/** Function that runs a shell command line */
export type ShellRunner = (command: string) => Promise<ExecutionResult>;

/** Options for creating the demo context */
export interface DemoContextOptions {
  /** Run shell commands for demo::shell */
  runShell: ShellRunner;
  /** Seconds since the session started, for demo::elapsed */
  elapsedSeconds: () => number;
  /** Raw CLI args tuple ($ARGS) */
  rawArgs?: string[] | undefined;
  /** Environment variables ($ENV) */
  env?: Record<string, string> | undefined;
  /** Script path ($SCRIPT) */
  scriptFile?: string | undefined;
  /** Logging callbacks */
  callbacks?: Partial<RuntimeCallbacks> | undefined;
}

function stringArg(args: RillValue[], index: number): string {
  return formatRillValue(args[index] ?? null);
}

/**
 * process.env without unset entries
 */
export function definedEnv(
  source: NodeJS.ProcessEnv = process.env
): Record<string, string> {
  const env: Record<string, string> = {};
  for (const [key, value] of Object.entries(source)) {
    if (value !== undefined) {
      env[key] = value;
    }
  }
  return env;
}

// ============================================================
// RUNTIME CONTEXT FACTORY
// ============================================================

/**
 * Create the Rill runtime context shared by every line of a demo
 */
export function createDemoContext(options: DemoContextOptions): RuntimeContext {
  const {
    runShell,
    elapsedSeconds,
    rawArgs = [],
    env = definedEnv(),
    scriptFile = '',
    callbacks = {},
  } = options;

  const functions: Record<string, CallableFn | HostFunctionDefinition> = {
    /**
     * Run a shell command and return its output
     * Usage: demo::shell("ls -la")
     */
    'demo::shell': {
      params: [{ name: 'command', type: 'string' }],
      fn: async (args) => {
        const command = stringArg(args, 0);
        const result = await runShell(command);
        if (result.exitCode !== 0) {
          throw new Error(
            `Shell command exited with code ${result.exitCode}: ${command}`
          );
        }
        return result.output.replace(/\n+$/, '');
      },
    },

    /**
     * Check if a file exists
     * Usage: demo::file_exists("path/to/file") -> boolean
     */
    'demo::file_exists': {
      params: [{ name: 'path', type: 'string' }],
      fn: (args) => fs.existsSync(stringArg(args, 0)),
    },

    /**
     * Read a text file
     * Usage: demo::read_file("notes.txt")
     */
    'demo::read_file': {
      params: [{ name: 'path', type: 'string' }],
      fn: (args) => {
        const filePath = stringArg(args, 0);
        if (!fs.existsSync(filePath)) {
          throw new Error(`File not found: ${filePath}`);
        }
        return fs.readFileSync(filePath, 'utf-8');
      },
    },

    /**
     * Whole seconds since the demo started
     * Usage: demo::elapsed()
     */
    'demo::elapsed': {
      params: [],
      fn: () => elapsedSeconds(),
    },

    /**
     * Fail the current line with a message
     * Usage: demo::error("not ready yet")
     */
    'demo::error': {
      params: [{ name: 'message', type: 'string', defaultValue: 'Error' }],
      fn: (args) => {
        throw new Error(stringArg(args, 0));
      },
    },
  };

  const variables: Record<string, RillValue> = {
    ARGS: rawArgs,
    ENV: env,
    SCRIPT: scriptFile,
  };

  return createRuntimeContext({
    variables,
    functions,
    callbacks: {
      onLog: callbacks.onLog ?? (() => undefined),
    },
  });
}
