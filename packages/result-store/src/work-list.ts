/**
 * Work list reader
 */

import * as fs from 'fs';
import { Errors, STORE_LAYOUT } from '@reelscope/core';
import { parseCsvRecords } from './csv-format.js';

export interface WorkListOptions {
  /** Column holding the video URLs */
  keyColumn?: string;
}

/**
 * Drop empty keys and duplicates, keeping first-seen order
 */
export function dedupeKeys(keys: readonly string[]): string[] {
  const seen = new Set<string>();
  const result: string[] = [];
  for (const raw of keys) {
    const key = raw.trim();
    if (key === '' || seen.has(key)) continue;
    seen.add(key);
    result.push(key);
  }
  return result;
}

/**
 * Read the URLs to process from the input CSV
 */
export function readWorkList(filePath: string, options: WorkListOptions = {}): string[] {
  const keyColumn = options.keyColumn ?? STORE_LAYOUT.KEY_COLUMN;

  if (!fs.existsSync(filePath)) {
    throw Errors.inputNotFound(filePath);
  }

  const [header = [], ...records] = parseCsvRecords(fs.readFileSync(filePath, 'utf-8'));
  const keyIndex = header.findIndex(cell => cell.trim() === keyColumn);
  if (keyIndex === -1) {
    throw Errors.invalidInput(`Input file has no "${keyColumn}" column: ${filePath}`, {
      filePath,
      keyColumn,
    });
  }

  return dedupeKeys(records.map(record => record[keyIndex] ?? ''));
}
