/**
 * Response Classifier
 *
 * Decides, for one poll snapshot of a streaming chat answer, whether the
 * answer is still loading, incomplete, complete or timed out.
 */

import { RESPONSE_THRESHOLDS } from '@reelscope/core';

/**
 * Classification states
 */
export type ResponseState = 'LOADING' | 'INCOMPLETE' | 'COMPLETE' | 'TIMED_OUT';

/**
 * Why a snapshot got its state
 */
export type ClassificationReason =
  | 'loading-marker'
  | 'header-only'
  | 'too-short'
  | 'awaiting-stability'
  | 'terminal-marker'
  | 'stable'
  | 'poll-ceiling';

/**
 * Text observed on one poll tick
 */
export interface ResponseSnapshot {
  text: string;
  /** 1-based poll number within the current attempt */
  observedAtAttempt: number;
  charLength: number;
}

export interface Classification {
  state: ResponseState;
  reason: ClassificationReason;
}

/**
 * Classifier thresholds and markers
 */
export interface ClassifierConfig {
  /** Ephemeral "still working" markers, matched case-insensitively */
  loadingMarkers: readonly string[];
  /** Content that only appears once the answer is fully rendered */
  terminalMarkers: readonly string[];
  shortResponseThreshold: number;
  substantialResponseThreshold: number;
  stablePollsRequired: number;
  maxPolls: number;
  historyLimit: number;
}

export const DEFAULT_CLASSIFIER_CONFIG: ClassifierConfig = {
  loadingMarkers: ['thinking', 'generating', 'processing'],
  terminalMarkers: ['target surprise', 'execution style (unique elements)'],
  shortResponseThreshold: RESPONSE_THRESHOLDS.SHORT_RESPONSE,
  substantialResponseThreshold: RESPONSE_THRESHOLDS.SUBSTANTIAL_RESPONSE,
  stablePollsRequired: RESPONSE_THRESHOLDS.STABLE_POLLS,
  maxPolls: RESPONSE_THRESHOLDS.MAX_POLLS,
  historyLimit: RESPONSE_THRESHOLDS.HISTORY_LIMIT,
};

/**
 * A bare "Metrics | Value" column-header echo, optionally with its separator row
 */
const HEADER_ONLY_PATTERN = /^\s*\|?\s*metrics?\s*\|?\s*values?\s*\|?[\s:|-]*$/i;

export function createSnapshot(text: string, observedAtAttempt: number): ResponseSnapshot {
  return { text, observedAtAttempt, charLength: text.length };
}

export function isHeaderOnly(text: string): boolean {
  return HEADER_ONLY_PATTERN.test(text);
}

export function containsMarker(text: string, markers: readonly string[]): boolean {
  const lower = text.toLowerCase();
  return markers.some(marker => lower.includes(marker.toLowerCase()));
}

/**
 * Number of consecutive polls, ending with the current one, that saw the same text
 */
export function countStablePolls(
  snapshot: ResponseSnapshot,
  history: readonly ResponseSnapshot[]
): number {
  let count = 1;
  for (let i = history.length - 1; i >= 0; i--) {
    if (history[i]?.text !== snapshot.text) break;
    count++;
  }
  return count;
}

/**
 * Classify a snapshot against the preceding polls of the same attempt
 *
 * `history` holds earlier snapshots only, oldest first.
 */
export function classify(
  snapshot: ResponseSnapshot,
  history: readonly ResponseSnapshot[],
  config: ClassifierConfig = DEFAULT_CLASSIFIER_CONFIG
): Classification {
  const classification = classifyContent(snapshot, history, config);

  if (classification.state !== 'COMPLETE' && snapshot.observedAtAttempt >= config.maxPolls) {
    return { state: 'TIMED_OUT', reason: 'poll-ceiling' };
  }

  return classification;
}

function classifyContent(
  snapshot: ResponseSnapshot,
  history: readonly ResponseSnapshot[],
  config: ClassifierConfig
): Classification {
  const { text, charLength } = snapshot;

  if (containsMarker(text, config.loadingMarkers)) {
    return { state: 'LOADING', reason: 'loading-marker' };
  }

  if (charLength < config.shortResponseThreshold && isHeaderOnly(text)) {
    return { state: 'INCOMPLETE', reason: 'header-only' };
  }

  if (charLength <= config.substantialResponseThreshold) {
    return { state: 'INCOMPLETE', reason: 'too-short' };
  }

  if (containsMarker(text, config.terminalMarkers)) {
    return { state: 'COMPLETE', reason: 'terminal-marker' };
  }

  if (countStablePolls(snapshot, history) >= config.stablePollsRequired) {
    return { state: 'COMPLETE', reason: 'stable' };
  }

  return { state: 'INCOMPLETE', reason: 'awaiting-stability' };
}

/**
 * Bounded history of the snapshots seen in one attempt
 */
export class PollHistory {
  private items: ResponseSnapshot[] = [];

  constructor(private readonly limit: number = RESPONSE_THRESHOLDS.HISTORY_LIMIT) {}

  push(snapshot: ResponseSnapshot): void {
    this.items.push(snapshot);
    if (this.items.length > this.limit) {
      this.items.splice(0, this.items.length - this.limit);
    }
  }

  get snapshots(): readonly ResponseSnapshot[] {
    return this.items;
  }

  clear(): void {
    this.items = [];
  }
}
