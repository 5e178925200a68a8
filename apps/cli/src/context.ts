/**
 * What commands need from the outside world, swappable in tests
 */

import { Logger } from '@shipkit/shared';
import { AppStoreConnectService } from '@shipkit/deployment';
import type { MediaApi } from '@shipkit/media';
import { resolveCredentials } from './config.js';
import { terminalPrompter, type Prompter } from './prompt.js';

export interface CliContext {
  logger: Logger;
  prompter: Prompter;
  createApi: () => Promise<MediaApi>;
}

export function createDefaultContext(logger: Logger = new Logger()): CliContext {
  return {
    logger,
    prompter: terminalPrompter,
    createApi: async () => new AppStoreConnectService(await resolveCredentials(), { logger }),
  };
}
