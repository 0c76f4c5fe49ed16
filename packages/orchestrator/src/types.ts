/**
 * Orchestrator Types
 */

import type { AppConfig, PhaseCounts } from '@reelscope/core';
import type { ItemStatus } from '@reelscope/analysis-engine';

export type PipelineMode = 'full' | 'download-only' | 'upload-only';

export type PipelinePhase = 'download' | 'upload';

/**
 * Pipeline configuration
 */
export interface PipelineConfig {
  mode: PipelineMode;
  /** Split the work list into batches of this size (batch streaming mode) */
  batchSize?: number;
  /** Extra chat submissions per item */
  maxRetries: number;
  /** Extra chat submissions per item in batch streaming mode */
  streamingMaxRetries: number;
  /** Delete a video once its result is stored */
  deleteAfterUpload: boolean;
  /** Pause after each uploaded item */
  interItemDelayMs: number;
}

/**
 * Pipeline settings taken from the application configuration
 */
export function pipelineConfigFrom(config: AppConfig, mode: PipelineMode = 'full'): PipelineConfig {
  return {
    mode,
    batchSize: config.batchSize,
    maxRetries: config.maxRetries,
    streamingMaxRetries: config.streamingMaxRetries,
    deleteAfterUpload: config.deleteAfterUpload,
    interItemDelayMs: config.interItemDelayMs,
  };
}

/**
 * Upload counts; partial answers are stored and counted as successful
 */
export interface UploadCounts extends PhaseCounts {
  partial: number;
}

export interface RunSummary {
  runId: string;
  mode: PipelineMode;
  total: number;
  batches: number;
  download?: PhaseCounts;
  upload?: UploadCounts;
  startedAt: Date;
  finishedAt: Date;
  durationMs: number;
  outputFile: string;
}

/**
 * Pipeline event types
 */
export type PipelineEventType =
  | 'phase_started'
  | 'phase_completed'
  | 'item_downloaded'
  | 'item_uploaded'
  | 'item_skipped'
  | 'artifact_released';

export interface PipelineEvent {
  type: PipelineEventType;
  phase: PipelinePhase;
  timestamp: Date;
  url?: string;
  /** 1-based position within the phase */
  position?: number;
  /** Items in the phase */
  total?: number;
  status?: ItemStatus | 'downloaded' | 'failed' | 'skipped';
  details?: Record<string, unknown>;
}

export type PipelineEventHandler = (event: PipelineEvent) => void | Promise<void>;
