import { describe, it, expect } from 'vitest';
import type { StoreRow, TabularStore } from '@reelscope/core';
import { failureFields, isEffectiveRow, isFailureRow, needsProcessing } from '../../gatekeeper.js';

const SCHEMA = ['Business Unit', 'Category', 'Brand'] as const;

/**
 * Minimal read-only store over fixed rows
 */
class FixedStore implements TabularStore {
  readonly schema: readonly string[] = SCHEMA;

  constructor(private readonly stored: StoreRow[]) {}

  async readRow(key: string): Promise<StoreRow | undefined> {
    return (await this.readRows(key)).at(-1);
  }

  async readRows(key: string): Promise<StoreRow[]> {
    return this.stored.filter(row => row.key === key);
  }

  async appendRow(): Promise<void> {
    throw new Error('read-only');
  }

  async keyExists(key: string): Promise<boolean> {
    return this.stored.some(row => row.key === key);
  }

  async rows(): Promise<StoreRow[]> {
    return [...this.stored];
  }

  async reload(): Promise<void> {}
}

const row = (key: string, fields: Record<string, string>): StoreRow => ({ key, fields });

describe('Upload Gatekeeper', () => {
  describe('isEffectiveRow', () => {
    it('should reject rows that only echo their column labels', () => {
      expect(isEffectiveRow(row('k', { 'Business Unit': ' business unit ', Category: 'Category', Brand: '' }), SCHEMA)).toBe(false);
    });

    it('should reject empty rows', () => {
      expect(isEffectiveRow(row('k', {}), SCHEMA)).toBe(false);
    });

    it('should accept a row with one real value', () => {
      expect(isEffectiveRow(row('k', { 'Business Unit': 'Business Unit', Brand: 'Glow' }), SCHEMA)).toBe(true);
    });
  });

  describe('failure rows', () => {
    it('should build and recognise the sentinel row', () => {
      const fields = failureFields('no file input', SCHEMA);
      expect(fields).toEqual({ 'Business Unit': 'FAILED: no file input', Category: '', Brand: '' });
      expect(isFailureRow(row('k', fields), SCHEMA)).toBe(true);
      expect(isFailureRow(row('k', { 'Business Unit': 'Beauty' }), SCHEMA)).toBe(false);
    });

    it('should treat the sentinel row as effective', () => {
      expect(isEffectiveRow(row('k', failureFields('timeout', SCHEMA)), SCHEMA)).toBe(true);
    });
  });

  describe('needsProcessing', () => {
    it('should process an absent key', async () => {
      await expect(needsProcessing('https://example.com/v/1', new FixedStore([]))).resolves.toBe(true);
    });

    it('should process a key whose rows are all header echoes', async () => {
      const store = new FixedStore([
        row('K', { 'Business Unit': 'Business Unit', Category: 'Category', Brand: 'Brand' }),
        row('K', {}),
      ]);
      await expect(needsProcessing('K', store)).resolves.toBe(true);
    });

    it('should skip a key with any effective row', async () => {
      const store = new FixedStore([
        row('K', {}),
        row('K', { 'Business Unit': 'Beauty' }),
        row('other', {}),
      ]);
      await expect(needsProcessing('K', store)).resolves.toBe(false);
      await expect(needsProcessing('other', store)).resolves.toBe(true);
    });
  });
});
