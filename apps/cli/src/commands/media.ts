import { Command, InvalidArgumentError } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import { formatDuration, plural } from '@shipkit/shared';
import {
  MediaSync,
  describeFailure,
  describeKey,
  describeUploadTotals,
  emptySummary,
  formatCounts,
  formatReport,
  needsRepair,
  scanAssetFolder,
  summarizeReport,
  type AssetManifest,
  type MediaProgress,
  type SyncSummary,
  type VerifyReport,
} from '@shipkit/media';
import type { CliContext } from '../context.js';
import { confirm, confirmOutputPath, expandPath } from '../prompt.js';

interface UploadCommandOptions {
  folder: string;
  replace?: boolean;
  yes?: boolean;
  wait?: number;
  concurrency: number;
  retries: number;
}

interface DownloadCommandOptions {
  folder?: string;
  yes?: boolean;
}

interface VerifyCommandOptions {
  folder?: string;
  yes?: boolean;
}

const POLL_INTERVAL_MS = 5000;

function parseCount(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError(`Expected a positive whole number, got '${value}'.`);
  }
  return parsed;
}

function parseRetries(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 0) {
    throw new InvalidArgumentError(`Expected zero or a positive whole number, got '${value}'.`);
  }
  return parsed;
}

function progressText(progress: MediaProgress): string {
  return progress.key ? `${describeKey(progress.key)} ${progress.message}` : progress.message;
}

function printPlan(manifest: AssetManifest, replace: boolean): void {
  if (replace) {
    console.log(chalk.cyan('Mode:'), 'Replace existing media');
  }

  let currentLocale = '';
  for (const group of manifest.groups) {
    if (group.locale !== currentLocale) {
      currentLocale = group.locale;
      console.log(chalk.bold(`[${group.locale}]`));
    }
    const parts: string[] = [];
    if (group.screenshots.length > 0) parts.push(plural(group.screenshots.length, 'screenshot'));
    if (group.previews.length > 0) parts.push(plural(group.previews.length, 'preview'));
    console.log(`  ${group.displayType}: ${parts.join(', ')}`);
  }
  console.log('');
}

function printSummary(summary: SyncSummary): void {
  const line = formatCounts(summary);
  console.log('');
  console.log(summary.failed > 0 ? chalk.yellow(line) : chalk.green(line));

  for (const failure of summary.failures) {
    console.log(chalk.red(`  ✗ ${describeFailure(failure)}`));
  }
}

/**
 * `shipkit media`: upload, download and verify screenshots and app previews
 * of one App Store version.
 */
export function createMediaCommand(context: CliContext): Command {
  const { logger, prompter } = context;

  const cmd = new Command('media').description('Sync screenshots and app previews with App Store Connect');

  cmd
    .command('upload')
    .description('Upload a <locale>/<displayType>/ folder tree to a version')
    .argument('<versionId>', 'App Store version ID')
    .requiredOption('--folder <path>', 'Media folder to upload')
    .option('--replace', 'Delete existing items in each matching set first')
    .option('-y, --yes', 'Skip confirmation prompts')
    .option('--wait <seconds>', 'Wait for processing to finish after upload', parseCount)
    .option('--concurrency <n>', 'Parallel chunk transfers per file', parseCount, 4)
    .option('--retries <n>', 'Retries per chunk transfer after the first attempt', parseRetries, 3)
    .action(async (versionId: string, options: UploadCommandOptions) => {
      console.log(chalk.bold.blue('\n📤 Media Upload\n'));

      const root = expandPath(options.folder);
      const manifest = await scanAssetFolder(root);
      for (const warning of manifest.warnings) {
        logger.warn(warning.message);
      }
      if (manifest.groups.length === 0) {
        printSummary(emptySummary(manifest.warnings));
        return;
      }

      printPlan(manifest, options.replace ?? false);

      const locales = new Set(manifest.groups.map((g) => g.locale)).size;
      const question = `Upload ${describeUploadTotals(manifest.totalScreenshots, manifest.totalPreviews)} for ${plural(locales, 'locale')}? [y/N] `;
      if (!(await confirm(prompter, question, options.yes))) {
        console.log('Cancelled.');
        return;
      }

      const api = await context.createApi();
      const spinner = ora('Uploading media...').start();
      const sync = new MediaSync({
        api,
        logger,
        options: { chunkConcurrency: options.concurrency, chunkRetries: options.retries },
        onProgress: (progress) => {
          spinner.text = progressText(progress);
        },
      });

      const startTime = Date.now();
      let summary: SyncSummary;
      try {
        summary = await sync.upload({ root, versionId, replace: options.replace, manifest });
      } finally {
        spinner.stop();
      }

      printSummary(summary);
      console.log(chalk.gray(`Finished in ${formatDuration(Date.now() - startTime)}`));

      if (options.wait && summary.uploaded.length > 0) {
        const waiting = ora(`Waiting for ${plural(summary.uploaded.length, 'item')} to finish processing...`).start();
        const results = await sync.waitForUploads(summary.uploaded, {
          intervalMs: POLL_INTERVAL_MS,
          timeoutMs: options.wait * 1000,
        });
        waiting.stop();

        const pending = results.filter((r) => r.result.status !== 'complete');
        if (pending.length === 0) {
          logger.success('All uploads processed.');
        }
        for (const { upload, result } of pending) {
          const label = `[${upload.file.locale}] ${upload.file.displayType} ${upload.file.fileName}`;
          logger.warn(result.status === 'failed' ? `${label}: processing failed` : `${label}: still processing`);
        }
      }

      if (summary.failed > 0) {
        process.exitCode = 1;
      }
    });

  cmd
    .command('download')
    .description('Download every screenshot and preview of a version')
    .argument('<versionId>', 'App Store version ID')
    .option('--folder <path>', 'Destination folder (default: <versionId>-media)')
    .option('-y, --yes', 'Overwrite an existing folder without asking')
    .action(async (versionId: string, options: DownloadCommandOptions) => {
      console.log(chalk.bold.blue('\n📥 Media Download\n'));

      const folder = await confirmOutputPath(prompter, options.folder ?? `${versionId}-media`, options.yes);
      const root = expandPath(folder);

      logger.info(`Downloading media of version ${versionId} into ${root}`);

      const api = await context.createApi();
      const spinner = ora('Downloading media...').start();
      const sync = new MediaSync({
        api,
        logger,
        onProgress: (progress) => {
          spinner.text = progressText(progress);
        },
      });

      let summary: SyncSummary;
      try {
        summary = await sync.download({ root, versionId });
      } finally {
        spinner.stop();
      }

      printSummary(summary);
      if (summary.succeeded > 0) {
        console.log(chalk.cyan('Saved to:'), root);
      }
      if (summary.failed > 0) {
        process.exitCode = 1;
      }
    });

  cmd
    .command('verify')
    .description('Report processing state of every item; with --folder, re-upload stuck items')
    .argument('<versionId>', 'App Store version ID')
    .option('--folder <path>', 'Local media folder to repair from')
    .option('-y, --yes', 'Skip confirmation prompts')
    .action(async (versionId: string, options: VerifyCommandOptions) => {
      console.log(chalk.bold.blue('\n🔍 Media Verify\n'));

      const api = await context.createApi();
      const sync = new MediaSync({ api, logger });

      const spinner = ora('Checking media state...').start();
      let report: VerifyReport;
      try {
        report = await sync.verify(versionId);
      } finally {
        spinner.stop();
      }

      for (const line of formatReport(report)) {
        console.log(line);
      }
      console.log('');
      console.log(summarizeReport(report));

      if (!needsRepair(report)) {
        return;
      }
      if (!options.folder) {
        console.log(chalk.gray('Pass --folder <path> to re-upload stuck items from local files.'));
        return;
      }

      const flagged = report.sets.reduce(
        (count, set) => count + set.items.filter((item) => item.needsAttention).length,
        0
      );
      if (!(await confirm(prompter, `Retry ${plural(flagged, 'stuck item')}? [y/N] `, options.yes))) {
        console.log('Cancelled.');
        return;
      }

      const repairSpinner = ora('Repairing...').start();
      const repairing = new MediaSync({
        api,
        logger,
        onProgress: (progress) => {
          repairSpinner.text = progressText(progress);
        },
      });

      let summary: SyncSummary;
      try {
        summary = await repairing.repair(report, expandPath(options.folder));
      } finally {
        repairSpinner.stop();
      }
      printSummary(summary);

      console.log('');
      console.log(summarizeReport(await repairing.verify(versionId)));

      if (summary.failed > 0) {
        process.exitCode = 1;
      }
    });

  return cmd;
}
