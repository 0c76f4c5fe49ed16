/**
 * @reelscope/analysis-engine
 *
 * Response completion detection, metric extraction and upload gatekeeping.
 */

// Classifier
export {
  classify,
  createSnapshot,
  isHeaderOnly,
  containsMarker,
  countStablePolls,
  PollHistory,
  DEFAULT_CLASSIFIER_CONFIG,
} from './response-classifier.js';
export type {
  ResponseState,
  ClassificationReason,
  ResponseSnapshot,
  Classification,
  ClassifierConfig,
} from './response-classifier.js';

// Completeness
export {
  checkCompleteness,
  looksTruncated,
  DEFAULT_COMPLETENESS_CONFIG,
} from './completeness.js';
export type { CompletenessConfig, CompletenessVerdict } from './completeness.js';

// Extraction
export {
  extract,
  extractWithShape,
  detectShape,
  stripBoilerplate,
  cleanValue,
} from './metric-extractor.js';
export type { ResponseShape, ExtractOptions, ExtractionOutcome } from './metric-extractor.js';

// Controller
export { CompletionController } from './completion-controller.js';
export type {
  ControllerState,
  StateTransition,
  ItemStatus,
  ItemOutcome,
  ControllerConfig,
  CompletionControllerOptions,
} from './completion-controller.js';

// Gatekeeper
export { needsProcessing, isEffectiveRow, isFailureRow, failureFields } from './gatekeeper.js';
