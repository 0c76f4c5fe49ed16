/**
 * Result store migration
 *
 * Older runs wrote a two-column `url,message` file holding the raw chat
 * answer. Opening such a file re-extracts every message into the metric
 * columns. A metric-column file whose header no longer matches the schema is
 * rewritten with the current header, mapping columns by name. Both rewrites
 * back the original up first and keep the row count.
 */

import * as fs from 'fs/promises';
import { extract } from '@reelscope/analysis-engine';
import {
  Errors,
  STORE_LAYOUT,
  isReelscopeError,
  type ExtractionResult,
} from '@reelscope/core';
import type { Logger } from '@reelscope/run-logger';
import { formatCsvRecords, parseCsvRecords, sameHeader } from './csv-format.js';

export type MigrationKind = 'none' | 'created' | 'legacy' | 'header';

export interface MigrationReport {
  kind: MigrationKind;
  /** Data rows written by the migration */
  rows: number;
  backupPath?: string;
}

export interface MigrationOptions {
  schema: readonly string[];
  logger?: Logger;
  /** Maps a stored legacy message onto the schema */
  extractor?: (message: string, schema: readonly string[]) => ExtractionResult;
}

export function storeHeader(schema: readonly string[]): string[] {
  return [STORE_LAYOUT.KEY_COLUMN, ...schema];
}

export function isLegacyHeader(header: readonly string[]): boolean {
  return sameHeader(header, STORE_LAYOUT.LEGACY_HEADER);
}

async function fileExists(filePath: string): Promise<boolean> {
  try {
    await fs.access(filePath);
    return true;
  } catch {
    return false;
  }
}

/**
 * Write the whole store through a temporary file so a crash never leaves a
 * half-written table
 */
export async function writeStoreFile(
  filePath: string,
  records: readonly (readonly string[])[]
): Promise<void> {
  const tmpPath = `${filePath}.tmp`;
  try {
    await fs.writeFile(tmpPath, formatCsvRecords(records), 'utf-8');
    await fs.rename(tmpPath, filePath);
  } catch (error) {
    throw Errors.persistence(filePath, error instanceof Error ? error : undefined);
  }
}

function defaultExtractor(message: string, schema: readonly string[]): ExtractionResult {
  return extract(message, { schema });
}

/**
 * Bring the file at `filePath` to the current layout
 */
export async function migrateStore(
  filePath: string,
  options: MigrationOptions
): Promise<MigrationReport> {
  const header = storeHeader(options.schema);

  if (!(await fileExists(filePath))) {
    await writeStoreFile(filePath, [header]);
    options.logger?.info('Created result store', { filePath });
    return { kind: 'created', rows: 0 };
  }

  let records: string[][];
  try {
    records = parseCsvRecords(await fs.readFile(filePath, 'utf-8'));
  } catch (error) {
    throw Errors.migrationFailed(filePath, error instanceof Error ? error : undefined);
  }

  const [existingHeader, ...dataRows] = records;
  if (existingHeader === undefined) {
    await writeStoreFile(filePath, [header]);
    return { kind: 'created', rows: 0 };
  }

  if (sameHeader(existingHeader, header)) {
    return { kind: 'none', rows: dataRows.length };
  }

  const legacy = isLegacyHeader(existingHeader);
  const backupPath = `${filePath}${legacy ? STORE_LAYOUT.BACKUP_SUFFIX : STORE_LAYOUT.SCHEMA_BACKUP_SUFFIX}`;

  try {
    await fs.copyFile(filePath, backupPath);

    const rows = legacy
      ? migrateLegacyRows(dataRows, options)
      : remapRows(existingHeader, dataRows, options.schema);

    await writeStoreFile(filePath, [header, ...rows]);
    options.logger?.info(legacy ? 'Migrated legacy result store' : 'Rewrote result store header', {
      filePath,
      backupPath,
      rows: rows.length,
    });
    return { kind: legacy ? 'legacy' : 'header', rows: rows.length, backupPath };
  } catch (error) {
    if (isReelscopeError(error)) throw error;
    throw Errors.migrationFailed(filePath, error instanceof Error ? error : undefined);
  }
}

function migrateLegacyRows(dataRows: readonly string[][], options: MigrationOptions): string[][] {
  const extractor = options.extractor ?? defaultExtractor;
  return dataRows.map(record => {
    const [key = '', message = ''] = record;
    const fields = extractor(message, options.schema);
    return [key, ...options.schema.map(label => fields[label] ?? '')];
  });
}

function remapRows(
  existingHeader: readonly string[],
  dataRows: readonly string[][],
  schema: readonly string[]
): string[][] {
  const columnIndex = new Map<string, number>();
  existingHeader.forEach((name, i) => {
    const normalized = name.trim();
    if (!columnIndex.has(normalized)) columnIndex.set(normalized, i);
  });
  const keyIndex = columnIndex.get(STORE_LAYOUT.KEY_COLUMN) ?? 0;

  return dataRows.map(record => [
    record[keyIndex] ?? '',
    ...schema.map(label => {
      const index = columnIndex.get(label);
      return index === undefined ? '' : record[index] ?? '';
    }),
  ]);
}
