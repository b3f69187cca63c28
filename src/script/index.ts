/**
 * Script module - loading demo scripts
 */

// Types
export type { DemoScript, LineMatch, LoadScriptOptions } from './types.js';

// Loader
export {
  createDemoScript,
  loadDemoScript,
  splitScriptLines,
} from './loader.js';
