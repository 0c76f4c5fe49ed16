/**
 * Common types used across the Reelscope pipeline
 */

/**
 * One video tracked through download, analysis and storage
 */
export interface WorkItem {
  /** Canonical video URL; becomes the store row key */
  sourceKey: string;
  /** Path of the downloaded video file */
  localArtifactRef: string;
}

/**
 * Counts reported for one pipeline phase
 */
export interface PhaseCounts {
  successful: number;
  failed: number;
  skipped: number;
}

/**
 * Sleep function injected wherever the pipeline waits
 */
export type SleepFn = (ms: number) => Promise<void>;
