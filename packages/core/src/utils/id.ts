/**
 * ID generation utilities
 */

import { nanoid } from 'nanoid';

/**
 * Generate a prefixed ID, e.g. `run_V1StGXR8Z5jdHi6B`
 * @param prefix - Prefix to add (e.g., 'run')
 * @param length - Length of the random part (default: 16)
 * @returns A prefixed identifier string
 */
export function generatePrefixedId(prefix: string, length: number = 16): string {
  return `${prefix}_${nanoid(length)}`;
}

/**
 * Identifier of one pipeline run, carried on every log entry
 * @returns A `run_`-prefixed identifier
 */
export function createRunId(): string {
  return generatePrefixedId('run');
}
