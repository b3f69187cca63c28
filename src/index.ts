#!/usr/bin/env node
/**
 * Demo Player - walks an operator through a script one line at a time
 */

import { parseArgs } from './cli/args.js';
import { resolveScriptPath } from './cli/resolve.js';
import { createPlayerContext } from './core/context.js';
import { createExecutor, selectEngine } from './core/engine.js';
import { runDemo } from './core/player.js';
import { demoMessage } from './output/colors.js';
import { createLogger } from './output/logger.js';
import { loadDemoScript } from './script/index.js';
import { createConsoleTerminal } from './terminal/console.js';
import { InterruptError } from './terminal/types.js';
import { DEFAULT_CONFIG, type PlayerConfig } from './types/index.js';
import { EXIT_INTERRUPTED, MS_PER_SECOND } from './utils/constants.js';

async function main(): Promise<number> {
  const startTime = Date.now();
  const parsed = parseArgs(process.argv.slice(2));

  // Merge config with defaults
  const config: PlayerConfig = {
    ...DEFAULT_CONFIG,
    ...parsed.config,
  };

  const terminal = createConsoleTerminal();

  try {
    const scriptFile = await resolveScriptPath(terminal, parsed.scriptFile);
    const engine = selectEngine(config.engine, scriptFile);
    const logger = createLogger({
      enabled: config.enableLog,
      logDir: config.logDir,
      scriptFile,
    });

    const executor = createExecutor(engine, {
      terminal,
      logger,
      cwd: config.cwd,
      scriptFile,
      scriptArgs: parsed.scriptArgs,
      elapsedSeconds: () =>
        Math.floor((Date.now() - startTime) / MS_PER_SECOND),
    });

    try {
      const script = loadDemoScript(scriptFile, {
        trailer: executor.noop,
        commentMarker: config.commentMarker,
      });
      if (config.startLine > script.lineCount) {
        throw new Error(
          `Start line ${config.startLine} is past the end of ${scriptFile} (${script.lineCount} lines)`
        );
      }

      terminal.writeLine(
        demoMessage(
          `Playing ${scriptFile} (${script.lineCount} lines, engine: ${engine}). Press ? for help.`
        )
      );
      if (logger.filePath) {
        terminal.writeLine(demoMessage(`Log: ${logger.filePath}`));
      }

      const context = createPlayerContext({
        config,
        script,
        terminal,
        executor,
        logger,
        startTime,
      });
      await runDemo(context);
      return 0;
    } finally {
      executor.dispose();
      logger.close();
    }
  } catch (error) {
    if (error instanceof InterruptError) {
      terminal.writeLine();
      terminal.writeLine(demoMessage(error.message));
      return EXIT_INTERRUPTED;
    }
    throw error;
  } finally {
    terminal.close();
  }
}

// Run main
main()
  .then((code) => {
    process.exit(code);
  })
  .catch((err: unknown) => {
    const message = err instanceof Error ? err.message : String(err);
    console.error(`Error: ${message}`);
    process.exit(1);
  });
