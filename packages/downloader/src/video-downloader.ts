/**
 * Video Downloader
 *
 * Downloads the work list one video at a time. Existing files are reused,
 * unsupported platforms fail at once and everything else gets a bounded
 * number of attempts.
 */

import * as fs from 'fs';
import {
  DEFAULT_TIMEOUTS,
  Errors,
  MAX_RETRIES,
  formatError,
  sleep as defaultSleep,
  withRetry,
  type PhaseCounts,
  type SleepFn,
} from '@reelscope/core';
import type { Logger } from '@reelscope/run-logger';
import { artifactPath, detectPlatform, isSupportedPlatform } from './platform.js';
import type { VideoFetcher } from './playwright-fetcher.js';

export type DownloadStatus = 'downloaded' | 'skipped' | 'failed';

export interface DownloadResult {
  url: string;
  status: DownloadStatus;
  path: string;
  error?: string;
}

/**
 * A URL with its position in the work list (names files without an id)
 */
export interface DownloadRequest {
  url: string;
  index: number;
}

export interface DownloadSummary extends PhaseCounts {
  results: DownloadResult[];
}

export interface VideoDownloaderOptions {
  fetcher: VideoFetcher;
  downloadsDir: string;
  logger: Logger;
  /** Attempts per video, including the first */
  maxAttempts?: number;
  /** Delay between attempts */
  retryDelayMs?: number;
  /** Delay after each fetched video */
  delayMs?: number;
  sleep?: SleepFn;
}

export class VideoDownloader {
  private readonly fetcher: VideoFetcher;
  private readonly logger: Logger;
  private readonly sleep: SleepFn;
  private readonly maxAttempts: number;

  constructor(private readonly options: VideoDownloaderOptions) {
    this.fetcher = options.fetcher;
    this.logger = options.logger;
    this.sleep = options.sleep ?? defaultSleep;
    this.maxAttempts = Math.max(1, options.maxAttempts ?? MAX_RETRIES.DOWNLOAD);
  }

  /**
   * Path a video is (or will be) stored at
   */
  pathFor(url: string, index: number): string {
    return artifactPath(this.options.downloadsDir, url, index);
  }

  /**
   * Download one video
   */
  async download(url: string, index: number): Promise<DownloadResult> {
    const outputPath = this.pathFor(url, index);

    if (fs.existsSync(outputPath)) {
      this.logger.info('Video already downloaded', { url, outputPath });
      return { url, status: 'skipped', path: outputPath };
    }

    const platform = detectPlatform(url);
    if (!isSupportedPlatform(platform)) {
      const error = Errors.unsupportedPlatform(url);
      this.logger.warn('Unsupported platform', { url });
      return { url, status: 'failed', path: outputPath, error: formatError(error) };
    }

    this.logger.info('Downloading video', { url, platform });
    try {
      await withRetry(() => this.fetcher.fetch(url, platform, outputPath), {
        config: {
          maxRetries: this.maxAttempts - 1,
          initialDelayMs: this.options.retryDelayMs ?? DEFAULT_TIMEOUTS.DOWNLOAD_DELAY,
        },
        sleep: this.sleep,
        onRetry: (retry, delayMs, error) => {
          this.logger.warn('Download attempt failed', { url, attempt: retry, delayMs, error: error.message });
        },
      });
    } catch (error) {
      const failure = Errors.downloadFailed(url, this.maxAttempts, error instanceof Error ? error : undefined);
      this.logger.error('Download failed', { url, error: formatError(error) });
      return { url, status: 'failed', path: outputPath, error: formatError(failure) };
    }

    return { url, status: 'downloaded', path: outputPath };
  }

  /**
   * Download the requests in order, pausing after every fetched video
   */
  async downloadAll(
    requests: readonly DownloadRequest[],
    onResult?: (result: DownloadResult, position: number) => void | Promise<void>
  ): Promise<DownloadSummary> {
    const summary: DownloadSummary = { successful: 0, failed: 0, skipped: 0, results: [] };

    for (const [position, request] of requests.entries()) {
      this.logger.info(`Processing ${position + 1}/${requests.length}`, { url: request.url });
      const result = await this.download(request.url, request.index);
      summary.results.push(result);
      await onResult?.(result, position + 1);

      if (result.status === 'skipped') {
        summary.skipped++;
        continue;
      }

      if (result.status === 'downloaded') summary.successful++;
      else summary.failed++;

      if (position < requests.length - 1) {
        await this.sleep(this.options.delayMs ?? DEFAULT_TIMEOUTS.DOWNLOAD_DELAY);
      }
    }

    return summary;
  }

  async close(): Promise<void> {
    await this.fetcher.close();
  }
}
