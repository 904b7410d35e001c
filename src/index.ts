#!/usr/bin/env node

import { Command, Help } from 'commander';
import { logger } from './utils/logger.js';
import * as path from 'path';
import fs from 'fs/promises';
import { constants } from 'fs';
import { getVersion } from './utils/package.js';
import { parsePositiveNumber } from './cli/global-options.js';

import { setupResolveCommand } from './commands/resolve.js';
import { setupListCommand } from './commands/list.js';
import { setupCacheCommand } from './commands/cache.js';

/**
 * cratefit CLI - Main entry point
 *
 * Pins a Cargo package's dependencies to the newest versions that still
 * build and pass its tests.
 */

const program = new Command();

program
  .name('cratefit')
  .description('Find the newest dependency versions your Cargo project still builds with')
  .version(getVersion())
  .option('--cwd <dir>', 'set working directory')
  .option('--cache-dir <dir>', 'crate metadata cache directory')
  .option('--cache-age <hours>', 'refetch cached metadata older than this', parsePositiveNumber)
  .option('-v, --verbose', 'debug logging')
  .option('-q, --quiet', 'only log errors')
  .option('-s, --silent', 'no output at all')
  .configureHelp({
    sortSubcommands: true,
    formatHelp: (cmd, helper) => {
      if (cmd.parent) {
        return Help.prototype.formatHelp.call(helper, cmd, helper);
      }

      let output = 'cratefit <command>\n\n';

      output += 'Usage:\n\n';
      output += 'cratefit resolve                      pin dependencies of the package in .\n';
      output += 'cratefit resolve . --include "app-*"  pin dependencies of matching workspace members\n';
      output += 'cratefit list                         show declared dependencies\n';
      output += 'cratefit <command> -h                 help on <command>\n\n';

      output += 'Global options:\n\n';
      output += '    --cwd <dir>           set working directory\n';
      output += '    --cache-dir <dir>     crate metadata cache directory\n';
      output += '    --cache-age <hours>   refetch cached metadata older than this\n';
      output += '    -v, -q, -s            verbose, quiet, silent\n\n';

      output += 'All commands:\n\n';
      output += '    resolve, list,\n';
      output += '    cache info, cache clean, cache fetch\n\n';

      const version = cmd.version();
      if (version) {
        output += `cratefit@${version}\n`;
      }

      return output;
    }
  });

setupResolveCommand(program);
setupListCommand(program);
setupCacheCommand(program);

program.hook('preAction', async () => {
  const { cwd } = program.opts();
  if (typeof cwd !== 'string') {
    return;
  }
  // Manifests are rewritten in place, so the directory has to be writable
  const resolvedCwd = path.resolve(process.cwd(), cwd);
  try {
    const stats = await fs.stat(resolvedCwd);
    if (!stats.isDirectory()) {
      throw new Error('not a directory');
    }
    await fs.access(resolvedCwd, constants.R_OK | constants.W_OK);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    logger.debug('Rejected --cwd', { cwd: resolvedCwd, reason });
    console.error(`✗ Invalid --cwd '${cwd}': ${reason}`);
    process.exit(1);
  }
});

// === GLOBAL ERROR HANDLING ===

process.on('uncaughtException', (error) => {
  logger.error('Uncaught exception occurred', { error: error.message, stack: error.stack });
  console.error('❌ An unexpected error occurred. Run with --verbose for details.');
  process.exit(1);
});

process.on('unhandledRejection', (reason) => {
  logger.error('Unhandled promise rejection', { reason });
  console.error('❌ An unexpected error occurred. Run with --verbose for details.');
  process.exit(1);
});

/**
 * Main execution function
 */
export async function run(argv: string[] = process.argv): Promise<void> {
  try {
    // No arguments: show help and exit successfully
    if (argv.length <= 2) {
      program.outputHelp();
      process.exit(0);
    }

    await program.parseAsync(argv);
  } catch (error) {
    logger.error('CLI execution failed', { error });
    console.error('❌ Command execution failed. Use --help for usage information.');
    process.exit(1);
  }
}

// Only run main if this file is executed directly
if (process.argv[1] && (
    process.argv[1].endsWith('index.js') ||
    process.argv[1].endsWith('index.ts') ||
    process.argv[1].endsWith('cratefit')
  )) {
  run().catch((error: unknown) => {
    logger.error('Fatal error in main execution', { error });
    console.error('❌ Fatal error occurred. Exiting.');
    process.exit(1);
  });
}

export { program };
