/**
 * Pluggable line execution
 */

/** Result of executing one line */
export interface ExecutionResult {
  /** Output to show the audience */
  output: string;
  /** 0 on success */
  exitCode: number;
}

/**
 * Runs a line of script text in the executor's environment.
 * Implementations throw on failure; the player reports and carries on.
 */
export interface CommandExecutor {
  readonly name: string;
  /** Harmless line appended as the script trailer */
  readonly noop: string;
  execute(text: string): Promise<ExecutionResult>;
  dispose(): void;
}

/**
 * Execution failure with a display-ready message
 */
export class ExecutionError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ExecutionError';
  }
}
