/**
 * Pipeline Implementation
 *
 * Runs the download phase and the upload phase over the work list, either
 * once over the whole list or batch by batch (batch streaming mode). Items
 * go through one at a time; the store is reloaded before every decision.
 */

import * as fs from 'fs';
import {
  DEFAULT_ANALYSIS_PROMPT,
  Errors,
  fillRatio,
  formatError,
  sleep as realSleep,
  type AppConfig,
  type AutomationSurface,
  type PhaseCounts,
  type SleepFn,
} from '@reelscope/core';
import {
  CompletionController,
  DEFAULT_CLASSIFIER_CONFIG,
  failureFields,
  isFailureRow,
  needsProcessing,
  type ControllerConfig,
  type ItemOutcome,
} from '@reelscope/analysis-engine';
import type { DownloadRequest, VideoDownloader } from '@reelscope/downloader';
import type { Logger } from '@reelscope/run-logger';
import type { RunContext } from './run-context.js';
import type {
  PipelineConfig,
  PipelineEvent,
  PipelineEventHandler,
  RunSummary,
  UploadCounts,
} from './types.js';
import { pipelineConfigFrom } from './types.js';

export interface PipelineOptions {
  context: RunContext;
  downloader: VideoDownloader;
  surface: AutomationSurface;
  config?: Partial<PipelineConfig>;
  sleep?: SleepFn;
}

interface Batch {
  urls: readonly string[];
  /** Work-list index of the first URL */
  offset: number;
}

/**
 * Controller settings taken from the application configuration
 */
export function controllerConfigFrom(
  config: AppConfig,
  schema: readonly string[]
): Partial<ControllerConfig> & Pick<ControllerConfig, 'target' | 'prompt'> {
  return {
    target: config.chatUrl,
    prompt: config.prompt ?? DEFAULT_ANALYSIS_PROMPT,
    maxRetries: config.maxRetries,
    pollIntervalMs: config.pollIntervalMs,
    pageSettleMs: config.pageSettleMs,
    uploadSettleMs: config.uploadSettleMs,
    classifier: {
      ...DEFAULT_CLASSIFIER_CONFIG,
      maxPolls: config.maxPolls,
      stablePollsRequired: config.stablePollsRequired,
    },
    schema,
  };
}

/**
 * Pipeline class
 */
export class Pipeline {
  private readonly context: RunContext;
  private readonly config: PipelineConfig;
  private readonly downloader: VideoDownloader;
  private readonly surface: AutomationSurface;
  private readonly controller: CompletionController;
  private readonly logger: Logger;
  private readonly sleep: SleepFn;
  private eventHandlers: Set<PipelineEventHandler> = new Set();

  constructor(options: PipelineOptions) {
    this.context = options.context;
    this.config = {
      ...pipelineConfigFrom(options.context.config),
      ...options.config,
    };
    this.downloader = options.downloader;
    this.surface = options.surface;
    this.sleep = options.sleep ?? realSleep;
    this.logger = options.context.logger.child('pipeline');
    this.controller = new CompletionController({
      surface: options.surface,
      logger: options.context.logger.child('controller'),
      config: controllerConfigFrom(options.context.config, options.context.store.schema),
      sleep: this.sleep,
    });

    // The run context closes the surface at teardown
    options.context.surface = options.surface;
  }

  /**
   * Subscribe to pipeline events
   */
  on(handler: PipelineEventHandler): () => void {
    this.eventHandlers.add(handler);
    return () => this.eventHandlers.delete(handler);
  }

  private async emit(event: Omit<PipelineEvent, 'timestamp'>): Promise<void> {
    for (const handler of this.eventHandlers) {
      try {
        await handler({ ...event, timestamp: new Date() });
      } catch (error) {
        this.logger.warn('Event handler error', { type: event.type, error: formatError(error) });
      }
    }
  }

  /**
   * Run the pipeline over a deduplicated work list
   */
  async run(urls: readonly string[]): Promise<RunSummary> {
    const startedAt = new Date();
    const { mode } = this.config;
    const streaming = this.config.batchSize !== undefined;
    const batches = this.split(urls);
    let download: PhaseCounts | undefined;
    let upload: UploadCounts | undefined;

    this.logger.info('Pipeline started', {
      mode,
      total: urls.length,
      batches: batches.length,
      batchSize: this.config.batchSize,
    });

    try {
      if (mode !== 'download-only') {
        await this.requireSession();
      }

      for (const [number, batch] of batches.entries()) {
        if (streaming) {
          this.logger.info(`Batch ${number + 1}/${batches.length}`, {
            from: batch.offset + 1,
            to: batch.offset + batch.urls.length,
          });
        }

        if (mode !== 'upload-only') {
          download = addCounts(download, await this.downloadPhase(batch));
        }
        if (mode !== 'download-only') {
          const counts = await this.uploadPhase(batch, streaming);
          upload = upload ? { ...addCounts(upload, counts), partial: upload.partial + counts.partial } : counts;
        }
      }
    } finally {
      await this.downloader.close();
    }

    const finishedAt = new Date();
    const summary: RunSummary = {
      runId: this.context.runId,
      mode,
      total: urls.length,
      batches: batches.length,
      download,
      upload,
      startedAt,
      finishedAt,
      durationMs: finishedAt.getTime() - startedAt.getTime(),
      outputFile: this.context.config.outputFile,
    };
    this.logger.info('Pipeline finished', { download, upload, durationMs: summary.durationMs });
    return summary;
  }

  /**
   * Download every video that still needs a chat answer
   */
  async downloadPhase(batch: Batch): Promise<PhaseCounts> {
    const store = this.context.store;
    await store.reload();

    const requests: DownloadRequest[] = [];
    let alreadyStored = 0;
    for (const [position, url] of batch.urls.entries()) {
      if (await needsProcessing(url, store)) {
        requests.push({ url, index: batch.offset + position });
      } else {
        alreadyStored++;
        await this.emit({ type: 'item_skipped', phase: 'download', url, status: 'skipped' });
      }
    }

    this.logger.info('Download phase started', { pending: requests.length, alreadyStored });
    await this.emit({ type: 'phase_started', phase: 'download', total: requests.length });

    const result = await this.downloader.downloadAll(requests, (item, position) =>
      this.emit({
        type: 'item_downloaded',
        phase: 'download',
        url: item.url,
        position,
        total: requests.length,
        status: item.status,
        details: item.error ? { error: item.error } : undefined,
      })
    );

    const counts: PhaseCounts = {
      successful: result.successful,
      failed: result.failed,
      skipped: result.skipped + alreadyStored,
    };
    this.logger.info('Download phase complete', { ...counts });
    await this.emit({ type: 'phase_completed', phase: 'download', details: { ...counts } });
    return counts;
  }

  /**
   * Submit every downloaded video that has no effective row yet
   */
  async uploadPhase(batch: Batch, streaming = false): Promise<UploadCounts> {
    const store = this.context.store;
    const maxRetries = streaming ? this.config.streamingMaxRetries : this.config.maxRetries;
    const counts: UploadCounts = { successful: 0, failed: 0, skipped: 0, partial: 0 };

    this.logger.info('Upload phase started', { items: batch.urls.length, maxRetries });
    await this.emit({ type: 'phase_started', phase: 'upload', total: batch.urls.length });

    for (const [position, url] of batch.urls.entries()) {
      await store.reload();
      if (!(await needsProcessing(url, store))) {
        counts.skipped++;
        const latest = await store.readRow(url);
        const previouslyFailed = latest !== undefined && isFailureRow(latest, store.schema);
        if (previouslyFailed) {
          this.logger.info('Skipping item that failed in an earlier run', { url });
        }
        await this.emit({
          type: 'item_skipped',
          phase: 'upload',
          url,
          status: 'skipped',
          details: { previouslyFailed },
        });
        continue;
      }

      const artifact = this.downloader.pathFor(url, batch.offset + position);
      if (!fs.existsSync(artifact)) {
        this.logger.warn('Video not downloaded', { url, artifact });
        counts.failed++;
        await this.emit({
          type: 'item_uploaded',
          phase: 'upload',
          url,
          position: position + 1,
          total: batch.urls.length,
          status: 'failed',
          details: { error: 'video not downloaded' },
        });
        continue;
      }

      const outcome = await this.controller.process(
        { sourceKey: url, localArtifactRef: artifact },
        { maxRetries }
      );
      await this.persist(url, outcome);

      if (outcome.status === 'failed') {
        counts.failed++;
      } else {
        counts.successful++;
        if (outcome.status === 'partial') counts.partial++;
        if (this.config.deleteAfterUpload) {
          await this.releaseArtifact(url, artifact);
        }
      }

      await this.emit({
        type: 'item_uploaded',
        phase: 'upload',
        url,
        position: position + 1,
        total: batch.urls.length,
        status: outcome.status,
        details: {
          attempts: outcome.attempts,
          fillRatio: fillRatio(outcome.result, store.schema),
          reason: outcome.reason,
        },
      });

      if (position < batch.urls.length - 1) {
        await this.sleep(this.config.interItemDelayMs);
      }
    }

    this.logger.info('Upload phase complete', { ...counts });
    await this.emit({ type: 'phase_completed', phase: 'upload', details: { ...counts } });
    return counts;
  }

  private async persist(url: string, outcome: ItemOutcome): Promise<void> {
    const store = this.context.store;

    if (outcome.status === 'failed') {
      const reason = outcome.reason ?? 'submission failed';
      await store.appendRow(url, failureFields(reason, store.schema));
      this.logger.error('Stored failure row', { url, reason });
      return;
    }

    await store.appendRow(url, outcome.result);
    const ratio = fillRatio(outcome.result, store.schema);
    if (outcome.status === 'partial') {
      this.logger.warn('Stored partial answer', { url, fillRatio: ratio, reason: outcome.reason });
    } else {
      this.logger.info('Stored answer', { url, fillRatio: ratio, attempts: outcome.attempts });
    }
  }

  private async releaseArtifact(url: string, artifact: string): Promise<void> {
    try {
      await fs.promises.rm(artifact, { force: true });
      await this.emit({ type: 'artifact_released', phase: 'upload', url, details: { artifact } });
    } catch (error) {
      this.logger.warn('Could not delete video', { artifact, error: formatError(error) });
    }
  }

  private async requireSession(): Promise<void> {
    const present = await this.surface.loadSessionToken();
    if (!present) {
      throw Errors.sessionMissing(this.context.config.sessionFile);
    }
  }

  private split(urls: readonly string[]): Batch[] {
    const size = this.config.batchSize;
    if (size === undefined || urls.length === 0) {
      return [{ urls, offset: 0 }];
    }

    const batches: Batch[] = [];
    for (let offset = 0; offset < urls.length; offset += size) {
      batches.push({ urls: urls.slice(offset, offset + size), offset });
    }
    return batches;
  }
}

function addCounts(total: PhaseCounts | undefined, counts: PhaseCounts): PhaseCounts {
  if (!total) return { ...counts };
  return {
    successful: total.successful + counts.successful,
    failed: total.failed + counts.failed,
    skipped: total.skipped + counts.skipped,
  };
}
