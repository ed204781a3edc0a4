#!/usr/bin/env node

// context-prime - Entry Point

import { CommanderError } from 'commander';
import { createCLI } from './cli/index.js';
import { handleError } from './utils/error-handler.js';

const includeStack = process.env.NODE_ENV === 'development' || Boolean(process.env.DEBUG);

async function main(): Promise<void> {
  try {
    const program = createCLI();
    await program.parseAsync(process.argv);
  } catch (error) {
    // Handle Commander.js exit override errors silently
    if (error instanceof CommanderError && (error.code === 'commander.version' || error.code === 'commander.helpDisplayed')) {
      return;
    }

    handleError(error, { context: 'main', includeStack });
    process.exitCode = 1;
  }
}

// Handle unhandled promise rejections globally
process.on('unhandledRejection', (reason) => {
  handleError(reason, { context: 'unhandledRejection', includeStack });
});

// Handle uncaught exceptions globally
process.on('uncaughtException', (error) => {
  handleError(error, {
    context: 'uncaughtException',
    includeStack: true, // Always show stack for uncaught exceptions
    exitProcess: true,
    exitCode: 1,
  });
});

void main();
