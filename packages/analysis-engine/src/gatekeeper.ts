/**
 * Upload Gatekeeper
 *
 * Decides whether an item still needs a chat submission by looking at what
 * the result store already holds for it.
 */

import { STORE_LAYOUT, type StoreRow, type TabularStore } from '@reelscope/core';

/**
 * A row is effective when at least one metric holds a real value, i.e. one
 * that is neither blank nor an echo of its own column label
 */
export function isEffectiveRow(row: StoreRow, schema: readonly string[]): boolean {
  return schema.some(label => {
    const value = (row.fields[label] ?? '').trim();
    return value !== '' && value.toLowerCase() !== label.trim().toLowerCase();
  });
}

/**
 * A sentinel row written for an item whose submission never succeeded
 */
export function isFailureRow(row: StoreRow, schema: readonly string[]): boolean {
  const first = schema[0];
  if (first === undefined) return false;
  return (row.fields[first] ?? '').startsWith(STORE_LAYOUT.FAILURE_PREFIX);
}

/**
 * Build the sentinel fields recorded for a failed item
 */
export function failureFields(reason: string, schema: readonly string[]): Record<string, string> {
  const fields: Record<string, string> = {};
  schema.forEach((label, i) => {
    fields[label] = i === 0 ? `${STORE_LAYOUT.FAILURE_PREFIX}${reason}` : '';
  });
  return fields;
}

/**
 * True unless the store already holds an effective row for the key
 */
export async function needsProcessing(key: string, store: TabularStore): Promise<boolean> {
  const rows = await store.readRows(key);
  return !rows.some(row => isEffectiveRow(row, store.schema));
}
