import { describe, it, expect } from 'vitest';
import { extractWithShape } from '@reelscope/analysis-engine';
import { runMode, runOverrides, type RunOptions } from '../../commands/run.js';
import { describeMigration } from '../../commands/migrate.js';
import { formatExtraction } from '../../commands/extract.js';
import { parseCount } from '../../commands/shared.js';

const baseOptions: RunOptions = {
  downloadOnly: false,
  uploadOnly: false,
  delete: true,
  headless: false,
  verbose: false,
};

describe('CLI commands', () => {
  describe('run', () => {
    it('should pass only explicit flags as overrides', () => {
      expect(runOverrides(baseOptions)).toEqual({
        inputFile: undefined,
        outputFile: undefined,
        prompt: undefined,
        batchSize: undefined,
        maxRetries: undefined,
      });
    });

    it('should map --no-delete, --headless and counts', () => {
      expect(
        runOverrides({ ...baseOptions, delete: false, headless: true, batchSize: 10, maxRetries: 4 })
      ).toEqual({
        inputFile: undefined,
        outputFile: undefined,
        prompt: undefined,
        batchSize: 10,
        maxRetries: 4,
        deleteAfterUpload: false,
        headless: true,
      });
    });

    it('should pick the pipeline mode', () => {
      expect(runMode(baseOptions)).toBe('full');
      expect(runMode({ downloadOnly: true, uploadOnly: false })).toBe('download-only');
      expect(runMode({ downloadOnly: false, uploadOnly: true })).toBe('upload-only');
      expect(() => runMode({ downloadOnly: true, uploadOnly: true })).toThrow(
        '--download-only and --upload-only cannot be combined'
      );
    });
  });

  describe('parseCount', () => {
    it('should accept whole numbers only', () => {
      expect(parseCount('12')).toBe(12);
      expect(parseCount('0')).toBe(0);
      expect(() => parseCount('1.5')).toThrow('Expected a whole number, got "1.5"');
      expect(() => parseCount('-2')).toThrow('Expected a whole number, got "-2"');
    });
  });

  describe('migrate', () => {
    it('should describe each migration kind', () => {
      expect(describeMigration({ kind: 'none', rows: 0 }, 'out.csv')).toBe(
        'out.csv already uses the current layout'
      );
      expect(describeMigration({ kind: 'legacy', rows: 3, backupPath: 'out.csv.legacy.bak' }, 'out.csv')).toBe(
        'Re-extracted 3 legacy rows in out.csv (backup: out.csv.legacy.bak)'
      );
    });
  });

  describe('extract', () => {
    it('should report shape, fill ratio and filled metrics', () => {
      const schema = ['Business Unit', 'Category', 'Target Surprise', 'Tone'];
      const outcome = extractWithShape('Business Unit: Beauty Category: Skincare', { schema });

      expect(formatExtraction(outcome, { schema })).toEqual([
        'Shape: prose',
        'Filled: 2/4 (50%)',
        'Business Unit: Beauty',
        'Category: Skincare',
      ]);
    });

    it('should list empty metrics on request', () => {
      const schema = ['Business Unit', 'Tone'];
      const outcome = extractWithShape('{"Business Unit": "Beauty"}', { schema });

      expect(formatExtraction(outcome, { schema, showEmpty: true })).toEqual([
        'Shape: json',
        'Filled: 1/2 (50%)',
        'Business Unit: Beauty',
        'Tone: -',
      ]);
    });
  });
});
