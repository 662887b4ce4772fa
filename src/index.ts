#!/usr/bin/env node

import { Command } from 'commander';
import * as path from 'path';
import fs from 'fs/promises';
import { constants, realpathSync } from 'fs';
import { fileURLToPath } from 'url';
import { logger } from './utils/logger.js';
import { getVersion } from './utils/package.js';
import { DEFAULT_CLIENT } from './constants/index.js';
import { LogLevel } from './types/index.js';

// Import command setup functions
import { setupDependCommand } from './commands/depend.js';
import { setupClearCommand } from './commands/clear.js';
import { setupListCommand } from './commands/list.js';
import { setupResolveCommand } from './commands/resolve.js';
import { setupCopyCommand } from './commands/copy.js';
import { setupResetCommand } from './commands/reset.js';

/**
 * m2resolve CLI - Main entry point
 *
 * Resolves Maven dependencies declared by independent clients against local
 * repositories and deploys one version of each artifact.
 */

const program = new Command();

program
  .name('m2resolve')
  .description('Resolve and deploy Maven artifacts from local repositories')
  .version(getVersion())
  .option('--cwd <dir>', 'set working directory')
  .option('--sdk <path>', 'Android SDK root (default: $ANDROID_HOME)')
  .option('--settings <dir>', 'directory holding the per-client dependency files (default: .m2resolve)')
  .option('--repository <paths...>', 'extra local Maven repositories to search')
  .option('--client <name>', 'client whose dependencies are declared or cleared', DEFAULT_CLIENT)
  .option('--verbose', 'print debug output')
  .configureHelp({ sortSubcommands: true });

// === DECLARATION COMMANDS ===
setupDependCommand(program);
setupClearCommand(program);
setupListCommand(program);
setupResetCommand(program);

// === RESOLUTION COMMANDS ===
setupResolveCommand(program);
setupCopyCommand(program);

program.hook('preAction', async () => {
  const opts = program.opts<{ cwd?: string; verbose?: boolean }>();

  if (opts.verbose) {
    logger.setLevel(LogLevel.DEBUG);
  }

  if (opts.cwd) {
    const resolvedCwd = path.resolve(process.cwd(), opts.cwd);
    try {
      const stats = await fs.stat(resolvedCwd);
      if (!stats.isDirectory()) {
        throw new Error(`'${opts.cwd}' is not a directory`);
      }
      await fs.access(resolvedCwd, constants.R_OK | constants.W_OK);
      logger.info(`Working directory will be: ${resolvedCwd}`);
    } catch (err) {
      const errMsg = err instanceof Error ? err.message : String(err);
      logger.error('Invalid --cwd provided', { error: errMsg, cwd: opts.cwd });
      console.error(`❌ Invalid --cwd '${opts.cwd}': Directory must exist, be accessible, and writable. Details: ${errMsg}`);
      process.exit(1);
    }
  } else {
    logger.debug(`Working directory: ${process.cwd()}`);
  }
});

// === GLOBAL ERROR HANDLING ===

process.on('uncaughtException', (error) => {
  logger.error('Uncaught exception occurred', { error: error.message, stack: error.stack });
  console.error('❌ An unexpected error occurred. Set M2RESOLVE_VERBOSE=1 for details.');
  process.exit(1);
});

process.on('unhandledRejection', (reason) => {
  logger.error('Unhandled promise rejection', { reason });
  console.error('❌ An unexpected error occurred. Set M2RESOLVE_VERBOSE=1 for details.');
  process.exit(1);
});

/**
 * Main execution function
 */
export async function run(): Promise<void> {
  try {
    // If no arguments provided, show help and exit successfully
    if (process.argv.length <= 2) {
      program.outputHelp();
      process.exit(0);
    }

    await program.parseAsync();
  } catch (error) {
    logger.error('CLI execution failed', { error });
    console.error('❌ Command execution failed. Use --help for usage information.');
    process.exit(1);
  }
}

// Only run main if this module is the one being executed (the bin link resolves to it)
if (process.argv[1] && realpathSync(process.argv[1]) === fileURLToPath(import.meta.url)) {
  run().catch((error) => {
    logger.error('Fatal error in main execution', { error });
    console.error('❌ Fatal error occurred. Exiting.');
    process.exit(1);
  });
}

export { program };
