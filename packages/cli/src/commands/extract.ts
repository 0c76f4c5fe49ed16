/**
 * reelscope extract - Parse a saved chat answer and show the metrics
 *
 * Usage:
 *   reelscope extract answer.txt
 *   reelscope extract answer.txt --json
 */

import { Command } from 'commander';
import chalk from 'chalk';
import * as fs from 'fs';
import { Errors, METRIC_SCHEMA, fillRatio } from '@reelscope/core';
import { extractWithShape, type ExtractionOutcome } from '@reelscope/analysis-engine';
import { reportError } from './shared.js';

interface ExtractOptions {
  json: boolean;
  empty: boolean;
}

/**
 * Text report of an extraction
 */
export function formatExtraction(
  outcome: ExtractionOutcome,
  options: { showEmpty?: boolean; schema?: readonly string[] } = {}
): string[] {
  const schema = options.schema ?? METRIC_SCHEMA;
  const ratio = fillRatio(outcome.result, schema);
  const filled = schema.filter(label => (outcome.result[label] ?? '').trim() !== '').length;
  const lines = [`Shape: ${outcome.shape}`, `Filled: ${filled}/${schema.length} (${Math.round(ratio * 100)}%)`];

  for (const label of schema) {
    const value = outcome.result[label] ?? '';
    if (value === '' && !options.showEmpty) continue;
    lines.push(`${label}: ${value === '' ? '-' : value}`);
  }
  return lines;
}

export const extractCommand = new Command('extract')
  .description('Extract the metrics from a saved chat answer')
  .argument('<file>', 'Text file holding the answer')
  .option('--json', 'Print the mapping as JSON', false)
  .option('--empty', 'Also list metrics without a value', false)
  .action((file: string, options: ExtractOptions) => {
    try {
      if (!fs.existsSync(file)) {
        throw Errors.inputNotFound(file);
      }

      const outcome = extractWithShape(fs.readFileSync(file, 'utf-8'));
      if (options.json) {
        console.log(JSON.stringify(outcome.result, null, 2));
        return;
      }

      const [shape, filled, ...metrics] = formatExtraction(outcome, { showEmpty: options.empty });
      console.log(chalk.bold(shape));
      console.log(chalk.bold(filled));
      for (const line of metrics) console.log(line);
    } catch (error) {
      reportError(error);
    }
  });
