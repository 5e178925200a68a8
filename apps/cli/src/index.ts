#!/usr/bin/env node
/**
 * shipkit CLI - App Store media sync
 */

import chalk from 'chalk';
import dotenv from 'dotenv';
import { ShipkitError } from '@shipkit/shared';
import { createDefaultContext } from './context.js';
import { createProgram } from './program.js';

dotenv.config();

const program = createProgram(createDefaultContext());

// Global error handler
program.exitOverride();

async function main() {
  try {
    await program.parseAsync(process.argv);
  } catch (error) {
    if (error instanceof ShipkitError) {
      console.error(chalk.red(`\nError: ${error.message}`));
      process.exit(1);
    }
    if (error instanceof Error && 'code' in error) {
      // Commander has already printed its own message
      if (error.code === 'commander.helpDisplayed' || error.code === 'commander.version') {
        return;
      }
      process.exit(1);
    }
    console.error(chalk.red(`\nError: ${error instanceof Error ? error.message : 'Unknown error'}`));
    process.exit(1);
  }
}

void main();
