/**
 * Terminal abstraction used by the demo loop
 */

/**
 * Console I/O the player needs. The real implementation wraps
 * process.stdin/stdout; tests drive the loop through a fake.
 */
export interface Terminal {
  /** Write text as-is */
  write(text: string): void;
  /** Write text followed by a newline */
  writeLine(text?: string): void;
  /** Wait for one keystroke; Enter is reported as "enter" */
  readKey(): Promise<string>;
  /** Read a whole line after printing prompt */
  readLine(prompt: string): Promise<string>;
  clear(): void;
  setTitle(title: string): void;
  sleep(ms: number): Promise<void>;
  close(): void;
}

/**
 * Raised when the operator presses Ctrl+C or input closes
 */
export class InterruptError extends Error {
  constructor(message = 'Interrupted') {
    super(message);
    this.name = 'InterruptError';
  }
}
