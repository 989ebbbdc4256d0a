#!/usr/bin/env node

import { createCLI } from './cli/commands.js';
import { ErrorHandler } from './utils/errorHandler.js';

async function main(): Promise<void> {
  // Set up global error handlers
  ErrorHandler.setupGlobalHandlers();

  try {
    const program = createCLI();
    await program.parseAsync();
  } catch (error) {
    ErrorHandler.handle(error);
  }
}

void main();
