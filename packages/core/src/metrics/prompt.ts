/**
 * Analysis prompt sent to the chat together with each video
 */

import { METRIC_DEFINITIONS, type MetricDefinition } from './metric-schema.js';

const PROMPT_INTRO =
  "Please analyze the video based on the following metrics and provide the results in a table format with two columns: 'Metrics' and 'Value'.";

/**
 * Render the fixed analysis prompt from the metric definitions
 */
export function buildAnalysisPrompt(
  definitions: readonly MetricDefinition[] = METRIC_DEFINITIONS
): string {
  const metrics = definitions
    .map(definition => `${definition.label}: [${definition.hint}]`)
    .join(' ');

  return `${PROMPT_INTRO}\n\nMetrics:\n\n${metrics}`;
}

export const DEFAULT_ANALYSIS_PROMPT = buildAnalysisPrompt();
