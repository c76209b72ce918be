#!/usr/bin/env node
import { realpathSync } from 'node:fs';
import { pathToFileURL } from 'node:url';
import { run } from 'cmd-ts';
import { cli } from './app.js';
import { errorMessage } from './errors/custom-errors.js';
import { restoreScreen } from './ui/node-terminal.js';
import { logger } from './utils/logger.js';

/**
 * shio - search anime across streaming sources and play episodes in an external player
 */

export async function main(args: string[] = process.argv.slice(2)): Promise<void> {
  await run(cli, args);
}

function fatal(message: string): never {
  restoreScreen(process.stdout);
  logger.error(message);
  process.exit(1);
}

function isEntryPoint(): boolean {
  const script = process.argv[1];
  if (!script) {
    return false;
  }
  try {
    return import.meta.url === pathToFileURL(realpathSync(script)).href;
  } catch {
    return false;
  }
}

if (isEntryPoint()) {
  // Set up global error handlers
  process.on('uncaughtException', (error) => fatal(`Uncaught exception: ${error.message}`));
  process.on('unhandledRejection', (reason) => fatal(`Unhandled rejection: ${errorMessage(reason)}`));

  main().catch((error: unknown) => fatal(`Fatal error: ${errorMessage(error)}`));
}
