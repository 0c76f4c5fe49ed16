/**
 * Completeness Check
 *
 * Second opinion on a candidate answer the classifier reported COMPLETE.
 */

import { COMPLETENESS_BOUNDS } from '@reelscope/core';
import { DEFAULT_CLASSIFIER_CONFIG, containsMarker } from './response-classifier.js';

export interface CompletenessConfig {
  acceptAbove: number;
  windowMin: number;
  windowMax: number;
  /** End-of-answer markers required inside the window */
  endMarkers: readonly string[];
}

export const DEFAULT_COMPLETENESS_CONFIG: CompletenessConfig = {
  acceptAbove: COMPLETENESS_BOUNDS.ACCEPT_ABOVE,
  windowMin: COMPLETENESS_BOUNDS.WINDOW_MIN,
  windowMax: COMPLETENESS_BOUNDS.WINDOW_MAX,
  endMarkers: DEFAULT_CLASSIFIER_CONFIG.terminalMarkers,
};

export type CompletenessVerdict =
  | { complete: true; reason: 'long-answer' | 'end-marker' }
  | { complete: false; reason: 'missing-end-marker' | 'truncated' | 'length-out-of-window' };

/**
 * True when the answer stops mid-token: a dangling hyphen, bold marker or colon
 */
export function looksTruncated(text: string): boolean {
  const trimmed = text.trimEnd();
  return trimmed.endsWith('-') || trimmed.endsWith('**') || trimmed.endsWith(':');
}

export function checkCompleteness(
  text: string,
  config: CompletenessConfig = DEFAULT_COMPLETENESS_CONFIG
): CompletenessVerdict {
  const length = text.trim().length;

  if (length > config.acceptAbove) {
    return { complete: true, reason: 'long-answer' };
  }

  // 1500-2000 is rejected as well
  if (length < config.windowMin || length > config.windowMax) {
    return { complete: false, reason: 'length-out-of-window' };
  }

  if (looksTruncated(text)) {
    return { complete: false, reason: 'truncated' };
  }

  if (!containsMarker(text, config.endMarkers)) {
    return { complete: false, reason: 'missing-end-marker' };
  }

  return { complete: true, reason: 'end-marker' };
}
