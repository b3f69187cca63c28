/**
 * Keystroke bindings for the demo loop
 */

export type PlayerCommand =
  | 'help'
  | 'execute'
  | 'next'
  | 'previous'
  | 'autoPlay'
  | 'quit'
  | 'viewSource'
  | 'timeCheck'
  | 'suspend'
  | 'goTo'
  | 'find'
  | 'clear'
  | 'unrecognized';

/** Normalized name the terminal reports for Enter */
export const ENTER_KEY = 'enter';

interface KeyBinding {
  keys: string[];
  command: Exclude<PlayerCommand, 'unrecognized'>;
  description: string;
}

export const KEY_BINDINGS: readonly KeyBinding[] = [
  { keys: ['?', 'h'], command: 'help', description: 'Show this help' },
  { keys: [ENTER_KEY], command: 'execute', description: 'Execute the line' },
  { keys: ['n'], command: 'next', description: 'Next line (skip)' },
  { keys: ['p', 'b'], command: 'previous', description: 'Previous line' },
  { keys: ['a'], command: 'autoPlay', description: 'Auto-play from here' },
  { keys: ['g'], command: 'goTo', description: 'Go to line' },
  { keys: ['f'], command: 'find', description: 'Find lines' },
  { keys: ['v'], command: 'viewSource', description: 'View source' },
  { keys: ['t'], command: 'timeCheck', description: 'Time check' },
  { keys: ['s'], command: 'suspend', description: 'Suspend (nested prompt)' },
  { keys: ['c'], command: 'clear', description: 'Clear screen' },
  { keys: ['q'], command: 'quit', description: 'Quit' },
];

const KEY_MAP = new Map<string, PlayerCommand>(
  KEY_BINDINGS.flatMap((binding) =>
    binding.keys.map((key) => [key, binding.command] as const)
  )
);

/**
 * Resolve a normalized key to a player command
 */
export function resolveCommand(key: string): PlayerCommand {
  return KEY_MAP.get(key.toLowerCase()) ?? 'unrecognized';
}

function keyLabel(key: string): string {
  return key === ENTER_KEY ? 'Enter' : key;
}

/**
 * Help legend, one line per binding
 */
export function helpLegend(): string[] {
  return KEY_BINDINGS.map((binding) => {
    const keys = binding.keys.map(keyLabel).join(', ');
    return `  ${keys.padEnd(8)} ${binding.description}`;
  });
}

export const UNRECOGNIZED_HINT =
  'Press ? for help, or Enter to execute the line';
