import { Command } from 'commander';
import chalk from 'chalk';
import { ValidationError } from '@shipkit/shared';
import { configDir, saveConfig } from '../config.js';
import type { CliContext } from '../context.js';
import { expandPath } from '../prompt.js';

interface ConfigureOptions {
  keyId?: string;
  issuerId?: string;
  privateKey?: string;
}

/**
 * `shipkit configure`: store App Store Connect API credentials. Values not
 * given as options are asked for.
 */
export function createConfigureCommand(context: CliContext): Command {
  const { logger, prompter } = context;

  return new Command('configure')
    .description('Set up App Store Connect API credentials')
    .option('--key-id <id>', 'API key ID')
    .option('--issuer-id <id>', 'Issuer ID')
    .option('--private-key <path>', 'Path to the AuthKey_<keyId>.p8 file')
    .action(async (options: ConfigureOptions) => {
      console.log(chalk.bold.blue('\n🔑 App Store Connect Credentials\n'));

      const keyId = (options.keyId ?? (await prompter.ask('Key ID: '))).trim();
      const issuerId = (options.issuerId ?? (await prompter.ask('Issuer ID: '))).trim();
      const keyPath = expandPath(options.privateKey ?? (await prompter.ask('Path to .p8 private key: ')));

      if (!keyId || !issuerId || !keyPath) {
        throw new ValidationError('Key ID, issuer ID and private key path are all required.');
      }

      const dir = configDir();
      const config = await saveConfig({ keyId, issuerId, privateKeySource: keyPath }, dir);

      logger.success(`Saved credentials to ${dir}`);
      console.log(chalk.cyan('Key ID:'), config.keyId);
      console.log(chalk.cyan('Issuer ID:'), config.issuerId);
      console.log(chalk.cyan('Private key:'), config.privateKeyPath);
    });
}
