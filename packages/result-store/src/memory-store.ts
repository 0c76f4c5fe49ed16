/**
 * In-memory Tabular Store for tests and dry runs
 */

import { METRIC_SCHEMA, type StoreRow, type TabularStore } from '@reelscope/core';

export class MemoryResultStore implements TabularStore {
  readonly schema: readonly string[];
  private stored: StoreRow[] = [];

  constructor(schema: readonly string[] = METRIC_SCHEMA, initial: StoreRow[] = []) {
    this.schema = schema;
    for (const row of initial) {
      this.stored.push(this.normalize(row.key, row.fields));
    }
  }

  async readRow(key: string): Promise<StoreRow | undefined> {
    return (await this.readRows(key)).at(-1);
  }

  async readRows(key: string): Promise<StoreRow[]> {
    return this.stored.filter(row => row.key === key.trim());
  }

  async appendRow(key: string, fields: Record<string, string>): Promise<void> {
    this.stored.push(this.normalize(key, fields));
  }

  async keyExists(key: string): Promise<boolean> {
    return this.stored.some(row => row.key === key.trim());
  }

  async rows(): Promise<StoreRow[]> {
    return [...this.stored];
  }

  async reload(): Promise<void> {
    // Nothing to re-read
  }

  private normalize(key: string, fields: Record<string, string>): StoreRow {
    const normalized: Record<string, string> = {};
    for (const label of this.schema) {
      normalized[label] = fields[label] ?? '';
    }
    return { key: key.trim(), fields: normalized };
  }
}
