/**
 * CLI argument parsing
 */

import { createRequire } from 'module';

import { isColorName } from '../output/colors.js';
import type {
  ColorScheme,
  Engine,
  ParsedArgs,
  PlayerConfig,
} from '../types/index.js';
import { DEFAULT_COLORS, ENGINES } from '../types/index.js';

const require = createRequire(import.meta.url);
const pkg = require('../../package.json') as { version: string };

const USAGE = 'Usage: demo-player [options] <script> [start-line] [-- args...]';

function fail(message: string): never {
  console.error(`Error: ${message}`);
  console.error(USAGE);
  process.exit(1);
}

function isEngine(value: string): value is Engine {
  return ENGINES.some((engine) => engine === value);
}

/**
 * Split `--flag=value` or take the next argument as the value
 */
function takeValue(
  args: string[],
  i: number,
  flag: string
): { value: string; next: number } {
  const arg = args[i] ?? '';
  if (arg.startsWith(`${flag}=`)) {
    return { value: arg.slice(flag.length + 1), next: i };
  }
  const value = args[i + 1];
  if (value === undefined) {
    fail(`${flag} requires a value`);
  }
  return { value, next: i + 1 };
}

function parseNonNegative(value: string, flag: string): number {
  const n = Number(value);
  if (value.trim() === '' || !Number.isFinite(n) || n < 0) {
    fail(`${flag} must be a number >= 0, got '${value}'`);
  }
  return n;
}

const COLOR_FLAGS: Record<string, keyof ColorScheme> = {
  '--prompt-color': 'prompt',
  '--command-color': 'command',
  '--comment-color': 'comment',
};

function matchesFlag(arg: string, flag: string): boolean {
  return arg === flag || arg.startsWith(`${flag}=`);
}

/**
 * Parse CLI arguments
 */
export function parseArgs(args: string[]): ParsedArgs {
  // Handle --version and --help early, ignoring anything after --
  const separator = args.indexOf('--');
  const options = separator === -1 ? args : args.slice(0, separator);
  if (options.includes('--version') || options.includes('-V')) {
    console.log(pkg.version);
    process.exit(0);
  }
  if (options.includes('--help') || options.includes('-h')) {
    printUsage();
    process.exit(0);
  }

  const config: Partial<PlayerConfig> = {};
  const colorOverrides: Partial<ColorScheme> = {};
  const positionalArgs: string[] = [];
  let scriptArgs: string[] = [];

  for (let i = 0; i < args.length; i++) {
    const arg = args[i] ?? '';

    if (arg === '--') {
      scriptArgs = args.slice(i + 1);
      break;
    } else if (arg === '--no-pause') {
      config.noPause = true;
    } else if (arg === '--no-log') {
      config.enableLog = false;
    } else if (matchesFlag(arg, '--engine')) {
      const { value, next } = takeValue(args, i, '--engine');
      if (!isEngine(value)) {
        fail(`unknown engine '${value}' (expected ${ENGINES.join(', ')})`);
      }
      config.engine = value;
      i = next;
    } else if (matchesFlag(arg, '--autoplay')) {
      const { value, next } = takeValue(args, i, '--autoplay');
      config.autoPlaySeconds = parseNonNegative(value, '--autoplay');
      i = next;
    } else if (matchesFlag(arg, '--typing-delay')) {
      const { value, next } = takeValue(args, i, '--typing-delay');
      config.typingDelayMs = parseNonNegative(value, '--typing-delay');
      i = next;
    } else if (matchesFlag(arg, '--comment-marker')) {
      const { value, next } = takeValue(args, i, '--comment-marker');
      if (value === '') {
        fail('--comment-marker cannot be empty');
      }
      config.commentMarker = value;
      i = next;
    } else if (matchesFlag(arg, '--cwd')) {
      const { value, next } = takeValue(args, i, '--cwd');
      config.cwd = value;
      i = next;
    } else if (matchesFlag(arg, '--log-dir')) {
      const { value, next } = takeValue(args, i, '--log-dir');
      config.logDir = value;
      i = next;
    } else {
      const colorFlag = Object.keys(COLOR_FLAGS).find((flag) =>
        matchesFlag(arg, flag)
      );
      const slot = colorFlag ? COLOR_FLAGS[colorFlag] : undefined;
      if (colorFlag && slot) {
        const { value, next } = takeValue(args, i, colorFlag);
        if (!isColorName(value)) {
          fail(`unknown color '${value}' for ${colorFlag}`);
        }
        colorOverrides[slot] = value;
        i = next;
      } else if (arg.startsWith('-') && arg !== '-') {
        fail(`unknown option '${arg}'`);
      } else {
        positionalArgs.push(arg);
      }
    }
  }

  const scriptFile = positionalArgs[0];
  if (!scriptFile) {
    fail('script file required');
  }

  const startArg = positionalArgs[1];
  if (startArg !== undefined) {
    if (!/^\d+$/.test(startArg)) {
      fail(`start line must be a non-negative integer, got '${startArg}'`);
    }
    config.startLine = Number.parseInt(startArg, 10);
  }

  if (positionalArgs.length > 2) {
    fail(`unexpected argument '${positionalArgs[2] ?? ''}'`);
  }

  if (Object.keys(colorOverrides).length > 0) {
    config.colors = { ...DEFAULT_COLORS, ...colorOverrides };
  }

  return { scriptFile, scriptArgs, config };
}

/**
 * Print usage information
 */
export function printUsage(): void {
  console.log(`
Demo Player - steps through a script one line at a time

${USAGE}

Arguments:
  <script>                  Script file, one command per line
  [start-line]              0-based index of the first line (default 0)
  -- args...                Extra arguments, available to Rill lines as $ARGS

Keys while playing:
  Enter  execute   n  next      p/b  previous   a  auto-play
  g      go to     f  find      v    view       t  time
  s      suspend   c  clear     q    quit       ?  help

Options:
  --engine <rill|shell>     How lines run (default: rill for .rill, else shell)
  --autoplay <seconds>      Start in auto-play with this interval
  --no-pause                Do not wait for a key after executing a line
  --typing-delay <ms>       Type lines out with this delay per character
  --comment-marker <text>   Prefix of comment lines (default: #)
  --prompt-color <name>     Prompt color (default: yellow)
  --command-color <name>    Command echo color (default: cyan)
  --comment-color <name>    Comment color (default: green)
  --cwd <dir>               Working directory for shell lines
  --no-log                  Disable the session log (enabled by default)
  --log-dir <dir>           Session log directory (default: logs)
  --version, -V             Print the version
  --help, -h                Show this help
`);
}
