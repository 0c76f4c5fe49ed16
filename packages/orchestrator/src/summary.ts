/**
 * Run summary formatting
 */

import type { PhaseCounts } from '@reelscope/core';
import type { RunSummary } from './types.js';

/**
 * Human-readable duration, e.g. `1h 02m 05s`, `3m 07s`, `12s`
 */
export function formatDuration(ms: number): string {
  const totalSeconds = Math.max(0, Math.round(ms / 1000));
  const hours = Math.floor(totalSeconds / 3600);
  const minutes = Math.floor((totalSeconds % 3600) / 60);
  const seconds = totalSeconds % 60;
  const pad = (value: number): string => String(value).padStart(2, '0');

  if (hours > 0) return `${hours}h ${pad(minutes)}m ${pad(seconds)}s`;
  if (minutes > 0) return `${minutes}m ${pad(seconds)}s`;
  return `${seconds}s`;
}

function phaseLines(title: string, counts: PhaseCounts, extra: string[] = []): string[] {
  return [
    title,
    `  Successful: ${counts.successful}`,
    ...extra,
    `  Failed: ${counts.failed}`,
    `  Skipped: ${counts.skipped}`,
  ];
}

/**
 * Summary lines printed at the end of a run
 */
export function formatRunSummary(summary: RunSummary): string[] {
  const lines = [
    `Run ${summary.runId} (${summary.mode})`,
    `Duration: ${formatDuration(summary.durationMs)}`,
    `Videos: ${summary.total}${summary.batches > 1 ? ` in ${summary.batches} batches` : ''}`,
  ];

  if (summary.download) {
    lines.push(...phaseLines('Download phase:', summary.download));
  }
  if (summary.upload) {
    lines.push(
      ...phaseLines('AI processing phase:', summary.upload, [`    of which partial: ${summary.upload.partial}`])
    );
  }

  lines.push(`Results saved to: ${summary.outputFile}`);
  return lines;
}
