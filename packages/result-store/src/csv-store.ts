/**
 * CSV Result Store
 *
 * Append-only CSV table: a `url` key column followed by one column per
 * metric label. Opening the store migrates older layouts; every append is
 * written straight to disk.
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import {
  Errors,
  METRIC_SCHEMA,
  type StoreRow,
  type TabularStore,
} from '@reelscope/core';
import type { Logger } from '@reelscope/run-logger';
import { formatCsvRecords, parseCsvRecords } from './csv-format.js';
import { migrateStore, type MigrationOptions, type MigrationReport } from './migration.js';

export interface CsvResultStoreOptions {
  filePath: string;
  schema?: readonly string[];
  logger?: Logger;
  extractor?: MigrationOptions['extractor'];
}

export class CsvResultStore implements TabularStore {
  readonly schema: readonly string[];
  readonly filePath: string;
  private readonly logger?: Logger;
  private loaded: StoreRow[] = [];
  private report: MigrationReport = { kind: 'none', rows: 0 };

  private constructor(options: CsvResultStoreOptions) {
    this.filePath = path.resolve(options.filePath);
    this.schema = options.schema ?? METRIC_SCHEMA;
    this.logger = options.logger;
  }

  /**
   * Open (creating or migrating as needed) and load the store
   */
  static async open(options: CsvResultStoreOptions): Promise<CsvResultStore> {
    const store = new CsvResultStore(options);
    try {
      await fs.mkdir(path.dirname(store.filePath), { recursive: true });
    } catch (error) {
      throw Errors.persistence(store.filePath, error instanceof Error ? error : undefined);
    }

    store.report = await migrateStore(store.filePath, {
      schema: store.schema,
      logger: options.logger,
      extractor: options.extractor,
    });
    await store.reload();
    return store;
  }

  /** What opening the store had to do to the file */
  get migration(): MigrationReport {
    return this.report;
  }

  async reload(): Promise<void> {
    let content: string;
    try {
      content = await fs.readFile(this.filePath, 'utf-8');
    } catch (error) {
      throw Errors.persistence(this.filePath, error instanceof Error ? error : undefined);
    }

    const [, ...dataRows] = parseCsvRecords(content);
    this.loaded = dataRows.map(record => this.toRow(record));
    this.logger?.debug('Loaded result store', { filePath: this.filePath, rows: this.loaded.length });
  }

  async readRow(key: string): Promise<StoreRow | undefined> {
    return (await this.readRows(key)).at(-1);
  }

  async readRows(key: string): Promise<StoreRow[]> {
    const wanted = key.trim();
    return this.loaded.filter(row => row.key === wanted);
  }

  async keyExists(key: string): Promise<boolean> {
    return (await this.readRows(key)).length > 0;
  }

  async rows(): Promise<StoreRow[]> {
    return [...this.loaded];
  }

  async appendRow(key: string, fields: Record<string, string>): Promise<void> {
    const record = [key.trim(), ...this.schema.map(label => fields[label] ?? '')];
    try {
      // A file saved without a trailing newline would fuse the new record with its last row
      const separator = (await this.endsWithNewline()) ? '' : '\n';
      await fs.appendFile(this.filePath, separator + formatCsvRecords([record]), 'utf-8');
    } catch (error) {
      throw Errors.persistence(this.filePath, error instanceof Error ? error : undefined);
    }
    this.loaded.push(this.toRow(record));
  }

  private async endsWithNewline(): Promise<boolean> {
    const handle = await fs.open(this.filePath, 'r');
    try {
      const { size } = await handle.stat();
      if (size === 0) return true;
      const { buffer } = await handle.read(Buffer.alloc(1), 0, 1, size - 1);
      return buffer[0] === 0x0a;
    } finally {
      await handle.close();
    }
  }

  private toRow(record: readonly string[]): StoreRow {
    const fields: Record<string, string> = {};
    this.schema.forEach((label, i) => {
      fields[label] = record[i + 1] ?? '';
    });
    return { key: (record[0] ?? '').trim(), fields };
  }
}
