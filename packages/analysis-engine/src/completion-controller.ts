/**
 * Retry/Completion Controller
 *
 * Drives one work item through the chat surface: submit, poll until the
 * classifier settles, verify completeness, and retry within a budget.
 *
 *   PENDING → SUBMITTING → POLLING → ACCEPTED
 *                  ↑            ↓
 *                  └──── RETRYING ──→ FAILED
 */

import {
  DEFAULT_TIMEOUTS,
  MAX_RETRIES,
  METRIC_SCHEMA,
  createEmptyResult,
  formatError,
  isFatalError,
  sleep as realSleep,
  type AutomationSurface,
  type ExtractionResult,
  type SleepFn,
  type WorkItem,
} from '@reelscope/core';
import type { Logger } from '@reelscope/run-logger';
import {
  DEFAULT_CLASSIFIER_CONFIG,
  PollHistory,
  classify,
  createSnapshot,
  type Classification,
  type ClassifierConfig,
} from './response-classifier.js';
import {
  DEFAULT_COMPLETENESS_CONFIG,
  checkCompleteness,
  type CompletenessConfig,
} from './completeness.js';
import { extract } from './metric-extractor.js';

export type ControllerState =
  | 'PENDING'
  | 'SUBMITTING'
  | 'POLLING'
  | 'ACCEPTED'
  | 'RETRYING'
  | 'FAILED';

export interface StateTransition {
  from: ControllerState;
  to: ControllerState;
  /** 1-based submission attempt */
  attempt: number;
  detail?: string;
}

export type ItemStatus = 'accepted' | 'partial' | 'failed';

/**
 * Result of driving one item through the chat
 */
export interface ItemOutcome {
  status: ItemStatus;
  /** Accepted text, or the longest text seen for a partial outcome */
  text: string;
  result: ExtractionResult;
  /** Submission attempts made */
  attempts: number;
  /** Why the item did not end as accepted */
  reason?: string;
  history: StateTransition[];
}

export interface ControllerConfig {
  /** Chat URL opened for every attempt */
  target: string;
  prompt: string;
  /** Extra attempts after the first */
  maxRetries: number;
  pollIntervalMs: number;
  pageSettleMs: number;
  uploadSettleMs: number;
  classifier: ClassifierConfig;
  completeness: CompletenessConfig;
  schema: readonly string[];
}

export interface CompletionControllerOptions {
  surface: AutomationSurface;
  logger: Logger;
  config: Partial<ControllerConfig> & Pick<ControllerConfig, 'target' | 'prompt'>;
  sleep?: SleepFn;
}

interface AttemptResult {
  text: string;
  longest: string;
  classification: Classification;
  polls: number;
}

export class CompletionController {
  private readonly surface: AutomationSurface;
  private readonly logger: Logger;
  private readonly config: ControllerConfig;
  private readonly sleep: SleepFn;

  constructor(options: CompletionControllerOptions) {
    this.surface = options.surface;
    this.logger = options.logger;
    this.sleep = options.sleep ?? realSleep;
    this.config = {
      maxRetries: MAX_RETRIES.UPLOAD,
      pollIntervalMs: DEFAULT_TIMEOUTS.POLL_INTERVAL,
      pageSettleMs: DEFAULT_TIMEOUTS.PAGE_SETTLE,
      uploadSettleMs: DEFAULT_TIMEOUTS.UPLOAD_SETTLE,
      classifier: DEFAULT_CLASSIFIER_CONFIG,
      completeness: DEFAULT_COMPLETENESS_CONFIG,
      schema: METRIC_SCHEMA,
      ...options.config,
    };
  }

  /**
   * Process one item. Fatal errors (an invalid session) propagate; every
   * other fault is folded into the outcome.
   */
  async process(item: WorkItem, overrides: { maxRetries?: number } = {}): Promise<ItemOutcome> {
    const maxRetries = overrides.maxRetries ?? this.config.maxRetries;
    const history: StateTransition[] = [];
    let state: ControllerState = 'PENDING';
    let attempt = 0;

    const transition = (to: ControllerState, detail?: string): void => {
      history.push({ from: state, to, attempt, ...(detail ? { detail } : {}) });
      this.logger.debug(`${state} -> ${to}`, { key: item.sourceKey, attempt, detail });
      state = to;
    };

    let submitted = false;
    let best = '';
    let lastFault: string | undefined;
    let lastReason: string | undefined;

    for (attempt = 1; attempt <= maxRetries + 1; attempt++) {
      transition('SUBMITTING');

      try {
        await this.submit(item);
      } catch (error) {
        if (isFatalError(error)) throw error;
        lastFault = formatError(error);
        this.logger.warn('Submission failed', { key: item.sourceKey, attempt, error: lastFault });
        if (attempt <= maxRetries) transition('RETRYING', lastFault);
        continue;
      }

      submitted = true;
      transition('POLLING');
      const polled = await this.pollUntilSettled(item);
      if (polled.longest.length > best.length) best = polled.longest;

      if (polled.classification.state === 'COMPLETE') {
        const verdict = checkCompleteness(polled.text, this.config.completeness);
        if (verdict.complete) {
          transition('ACCEPTED', verdict.reason);
          this.logger.info('Answer accepted', {
            key: item.sourceKey,
            attempt,
            polls: polled.polls,
            length: polled.text.length,
          });
          return {
            status: 'accepted',
            text: polled.text,
            result: extract(polled.text, { schema: this.config.schema }),
            attempts: attempt,
            history,
          };
        }
        lastReason = `incomplete answer (${verdict.reason})`;
      } else {
        lastReason = `no complete answer after ${polled.polls} polls`;
      }

      this.logger.warn('Answer rejected', { key: item.sourceKey, attempt, reason: lastReason });
      if (attempt <= maxRetries) transition('RETRYING', lastReason);
    }

    const attempts = maxRetries + 1;
    attempt = attempts;

    if (!submitted) {
      const reason = lastFault ?? 'submission failed';
      transition('FAILED', reason);
      this.logger.error('Item failed', { key: item.sourceKey, attempts, reason });
      return {
        status: 'failed',
        text: '',
        result: createEmptyResult(this.config.schema),
        attempts,
        reason,
        history,
      };
    }

    transition('ACCEPTED', 'partial');
    this.logger.warn('Retry budget exhausted, keeping best answer', {
      key: item.sourceKey,
      attempts,
      length: best.length,
    });
    return {
      status: 'partial',
      text: best,
      result: extract(best, { schema: this.config.schema }),
      attempts,
      reason: lastReason,
      history,
    };
  }

  private async submit(item: WorkItem): Promise<void> {
    await this.surface.navigate(this.config.target);
    await this.sleep(this.config.pageSettleMs);
    await this.surface.submitArtifact(item.localArtifactRef);
    await this.sleep(this.config.uploadSettleMs);
    await this.surface.submitText(this.config.prompt);

    try {
      await this.surface.persistSessionToken();
    } catch (error) {
      if (isFatalError(error)) throw error;
      this.logger.warn('Could not refresh session token', { error: formatError(error) });
    }
  }

  private async pollUntilSettled(item: WorkItem): Promise<AttemptResult> {
    const { historyLimit, stablePollsRequired } = this.config.classifier;
    // The current poll counts towards stability, the rest must still be in history
    const history = new PollHistory(Math.max(historyLimit, stablePollsRequired - 1));
    let longest = '';

    for (let poll = 1; ; poll++) {
      await this.sleep(this.config.pollIntervalMs);

      let text: string;
      try {
        text = await this.surface.pollText();
      } catch (error) {
        if (isFatalError(error)) throw error;
        this.logger.debug('Poll failed, treating as empty', {
          key: item.sourceKey,
          poll,
          error: formatError(error),
        });
        text = '';
      }

      const snapshot = createSnapshot(text, poll);
      const classification = classify(snapshot, history.snapshots, this.config.classifier);
      history.push(snapshot);
      if (text.length > longest.length) longest = text;

      if (classification.state === 'COMPLETE' || classification.state === 'TIMED_OUT') {
        this.logger.debug('Polling settled', {
          key: item.sourceKey,
          poll,
          state: classification.state,
          reason: classification.reason,
        });
        return { text, longest, classification, polls: poll };
      }
    }
  }
}
