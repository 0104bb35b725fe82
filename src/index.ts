#!/usr/bin/env node

// fabric-cli - Entry Point

import { CommanderError } from 'commander';
import { createCLI } from './cli/index.js';
import { createContext } from './cli/context.js';
import { loadConfig, loadDotenv } from './utils/config.js';
import { handleError } from './utils/error-handler.js';

async function main(): Promise<void> {
  loadDotenv();

  const program = createCLI(async () => createContext(await loadConfig()));

  try {
    await program.parseAsync(process.argv);
  } catch (error) {
    if (error instanceof CommanderError) {
      // Commander has already printed help, the version or the usage error
      process.exitCode = error.code === 'commander.helpDisplayed' || error.code === 'commander.version' ? 0 : error.exitCode;
      return;
    }

    handleError(error);
    process.exitCode = 1;
  }
}

// Handle unhandled promise rejections globally
process.on('unhandledRejection', (reason) => {
  handleError(reason, { context: 'unhandledRejection', exitProcess: true, exitCode: 1 });
});

main().catch((error: unknown) => {
  handleError(error, { context: 'main', includeStack: true, exitProcess: true, exitCode: 1 });
});
