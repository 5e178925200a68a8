/**
 * Command tree, separate from the entry point so tests can build it with
 * their own context
 */

import { Command } from 'commander';
import { createConfigureCommand } from './commands/configure.js';
import { createMediaCommand } from './commands/media.js';
import type { CliContext } from './context.js';

export function createProgram(context: CliContext): Command {
  const program = new Command();

  program
    .name('shipkit')
    .description('Sync App Store screenshots and app previews from the command line')
    .version('0.1.0')
    .option('--verbose', 'Show debug output, including every API request');

  program.hook('preAction', (thisCommand) => {
    if (thisCommand.opts().verbose) {
      context.logger.setLevel('debug');
    }
  });

  // Add commands
  program.addCommand(createConfigureCommand(context));
  program.addCommand(createMediaCommand(context));

  return program;
}
