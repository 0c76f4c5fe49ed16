/**
 * reelscope run - Download the work list and analyse every video
 *
 * Usage:
 *   reelscope run                      # Download, then analyse
 *   reelscope run --download-only      # Only fetch videos
 *   reelscope run --upload-only        # Only analyse downloaded videos
 *   reelscope run --batch-size 10      # Batch streaming mode
 */

import { Command, InvalidArgumentError } from 'commander';
import chalk from 'chalk';
import ora, { type Ora } from 'ora';
import type { AppConfigInput } from '@reelscope/core';
import { PlaywrightChatSurface } from '@reelscope/chat-surface';
import { PlaywrightVideoFetcher, VideoDownloader } from '@reelscope/downloader';
import {
  Pipeline,
  createRunContext,
  disposeRunContext,
  formatRunSummary,
  type PipelineEvent,
  type PipelineMode,
  type RunContext,
} from '@reelscope/orchestrator';
import { readWorkList } from '@reelscope/result-store';
import { loadCommandConfig, parseCount, reportError } from './shared.js';

export interface RunOptions {
  config?: string;
  input?: string;
  output?: string;
  prompt?: string;
  downloadOnly: boolean;
  uploadOnly: boolean;
  batchSize?: number;
  maxRetries?: number;
  delete: boolean;
  headless: boolean;
  verbose: boolean;
}

/**
 * Configuration overrides given by the flags
 */
export function runOverrides(options: RunOptions): Partial<AppConfigInput> {
  const overrides: Partial<AppConfigInput> = {
    inputFile: options.input,
    outputFile: options.output,
    prompt: options.prompt,
    batchSize: options.batchSize,
    maxRetries: options.maxRetries,
  };
  // Only explicit flags override file and environment settings
  if (!options.delete) overrides.deleteAfterUpload = false;
  if (options.headless) overrides.headless = true;
  return overrides;
}

export function runMode(options: Pick<RunOptions, 'downloadOnly' | 'uploadOnly'>): PipelineMode {
  if (options.downloadOnly && options.uploadOnly) {
    throw new InvalidArgumentError('--download-only and --upload-only cannot be combined');
  }
  if (options.downloadOnly) return 'download-only';
  if (options.uploadOnly) return 'upload-only';
  return 'full';
}

function countArgument(value: string): number {
  try {
    return parseCount(value);
  } catch (error) {
    throw new InvalidArgumentError(error instanceof Error ? error.message : String(error));
  }
}

/**
 * Spinner text for pipeline progress
 */
function trackProgress(pipeline: Pipeline, spinner: Ora): void {
  pipeline.on((event: PipelineEvent) => {
    const label = event.phase === 'download' ? 'Downloading' : 'Analysing';
    switch (event.type) {
      case 'phase_started':
        spinner.start(`${label} ${event.total ?? 0} videos...`);
        break;
      case 'item_downloaded':
      case 'item_uploaded':
        spinner.text = `${label} ${event.position ?? 0}/${event.total ?? 0} (${event.status ?? ''}) ${event.url ?? ''}`;
        break;
      case 'phase_completed':
        spinner.succeed(`${label} done`);
        break;
      default:
        break;
    }
  });
}

export const runCommand = new Command('run')
  .description('Download videos and analyse them in the AI chat')
  .option('-c, --config <file>', 'JSON config file')
  .option('-i, --input <file>', 'Work list CSV with a url column')
  .option('-o, --output <file>', 'Result store CSV')
  .option('-p, --prompt <text>', 'Analysis prompt (defaults to the metric prompt)')
  .option('--download-only', 'Only download videos', false)
  .option('--upload-only', 'Only analyse videos that are already downloaded', false)
  .option('--batch-size <n>', 'Download and analyse in batches of n videos', countArgument)
  .option('--max-retries <n>', 'Extra chat submissions per video', countArgument)
  .option('--no-delete', 'Keep videos after their result is stored')
  .option('--headless', 'Run the browser without a window', false)
  .option('-v, --verbose', 'Print log entries instead of a progress spinner', false)
  .action(async (options: RunOptions) => {
    const spinner = ora();
    let context: RunContext | undefined;

    try {
      const mode = runMode(options);
      const config = loadCommandConfig(options, runOverrides(options));
      const urls = readWorkList(config.inputFile, { keyColumn: config.inputKeyColumn });

      console.log(chalk.bold('Reelscope'));
      console.log(`Input:  ${chalk.cyan(config.inputFile)} (${urls.length} videos)`);
      console.log(`Output: ${chalk.cyan(config.outputFile)}`);
      console.log(`Mode:   ${chalk.yellow(mode)}${config.batchSize ? ` in batches of ${config.batchSize}` : ''}`);
      console.log(chalk.gray('─'.repeat(60)));

      context = await createRunContext(config, { console: options.verbose });
      const browserOptions = {
        headless: config.headless,
        slowMoMs: config.slowMoMs,
        browserChannel: config.browserChannel,
        navigationTimeoutMs: config.navigationTimeoutMs,
      };

      const downloader = new VideoDownloader({
        fetcher: new PlaywrightVideoFetcher({
          ...browserOptions,
          logger: context.logger.child('downloader'),
          downloadTimeoutMs: config.downloadTimeoutMs,
        }),
        downloadsDir: config.downloadsDir,
        logger: context.logger.child('downloader'),
        maxAttempts: config.maxDownloadAttempts,
        delayMs: config.downloadDelayMs,
      });
      const surface = new PlaywrightChatSurface({
        ...browserOptions,
        sessionFile: config.sessionFile,
        logger: context.logger.child('chat-surface'),
      });

      const pipeline = new Pipeline({ context, downloader, surface, config: { mode } });
      if (!options.verbose) trackProgress(pipeline, spinner);

      const summary = await pipeline.run(urls);

      console.log(chalk.gray('─'.repeat(60)));
      for (const line of formatRunSummary(summary)) {
        console.log(line.startsWith('  Failed') && !line.endsWith(' 0') ? chalk.red(line) : line);
      }
    } catch (error) {
      if (spinner.isSpinning) spinner.fail('Run stopped');
      reportError(error, options.verbose);
    } finally {
      if (context) await disposeRunContext(context);
    }
  });
