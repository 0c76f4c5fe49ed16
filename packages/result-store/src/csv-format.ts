/**
 * CSV reading and writing helpers
 */

import { parse } from 'csv-parse/sync';
import { stringify } from 'csv-stringify/sync';
import { z } from 'zod';

const RecordsSchema = z.array(z.array(z.string()));

/**
 * Parse CSV text into raw records (header included)
 */
export function parseCsvRecords(content: string): string[][] {
  return RecordsSchema.parse(
    parse(content, {
      bom: true,
      skip_empty_lines: true,
      relax_column_count: true,
    })
  );
}

/**
 * Serialize records as CSV text, one line per record
 */
export function formatCsvRecords(records: readonly (readonly string[])[]): string {
  return stringify(records.map(record => [...record]));
}

export function sameHeader(a: readonly string[], b: readonly string[]): boolean {
  return a.length === b.length && a.every((cell, i) => cell.trim() === (b[i] ?? '').trim());
}
