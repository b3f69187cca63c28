export type {
  ColorScheme,
  DemoSummary,
  Engine,
  ParsedArgs,
  PlayerConfig,
  PlayMode,
} from './player.js';
export { DEFAULT_COLORS, DEFAULT_CONFIG, ENGINES } from './player.js';
