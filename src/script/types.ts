/**
 * Types for loaded demo scripts
 */

/**
 * A demo script: the file's lines plus one synthetic trailer line
 */
export interface DemoScript {
  /** Path the script was loaded from */
  file: string;
  /** Real lines followed by the trailer */
  lines: string[];
  /** Number of real lines (lines.length - 1) */
  lineCount: number;
  /** Prefix that marks a comment line */
  commentMarker: string;
}

export interface LoadScriptOptions {
  /** No-op line appended after the last real line */
  trailer: string;
  commentMarker?: string | undefined;
}

/**
 * A line matched by find
 */
export interface LineMatch {
  index: number;
  text: string;
}
