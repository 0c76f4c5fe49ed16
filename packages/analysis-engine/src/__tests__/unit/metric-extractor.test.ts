/**
 * Tests for the Metric Extractor
 */

import { describe, it, expect } from 'vitest';
import { METRIC_SCHEMA } from '@reelscope/core';
import {
  extract,
  extractWithShape,
  detectShape,
  stripBoilerplate,
  cleanValue,
} from '../../metric-extractor.js';

const SMALL_SCHEMA = ['Business Unit', 'Category', 'Visuals // Color Palette'] as const;

describe('Metric Extractor', () => {
  describe('stripBoilerplate', () => {
    it('should strip stacked prefixes', () => {
      expect(stripBoilerplate('AI: My thought process Metrics | Value Business Unit: Beauty')).toBe(
        'Business Unit: Beauty'
      );
    });

    it('should strip a table header with its separator row', () => {
      expect(stripBoilerplate('| Metrics | Value |\n|---|---|\n| Brand | Glow |')).toBe('| Brand | Glow |');
    });

    it('should leave ordinary text alone', () => {
      expect(stripBoilerplate('  Brand: Glow  ')).toBe('Brand: Glow');
    });
  });

  describe('cleanValue', () => {
    it('should drop pipes, collapse whitespace and trim separators', () => {
      expect(cleanValue('  : **High** | ')).toBe('High');
      expect(cleanValue('Warm\n  and   bright')).toBe('Warm and bright');
      expect(cleanValue('Beauty -')).toBe('Beauty');
    });
  });

  describe('JSON shape', () => {
    it('should round-trip an object keyed by the schema', () => {
      const data = Object.fromEntries(METRIC_SCHEMA.map((label, i) => [label, `value ${i}`]));
      expect(extract(JSON.stringify(data))).toEqual(data);
    });

    it('should read fenced JSON surrounded by commentary', () => {
      const text = [
        'Here is the analysis:',
        '```json',
        '{"Business Unit": "Beauty", "Category": 3, "Visuals // Color Palette": ["red", "gold"]}',
        '```',
        'Let me know if you need more.',
      ].join('\n');

      expect(extractWithShape(text, { schema: SMALL_SCHEMA })).toEqual({
        shape: 'json',
        result: {
          'Business Unit': 'Beauty',
          Category: '3',
          'Visuals // Color Palette': '["red","gold"]',
        },
      });
    });

    it('should keep code fences inside string values', () => {
      const data = {
        'Business Unit': 'see ```js x``` here',
        Category: 'Skincare',
        'Visuals // Color Palette': '```',
      };
      expect(extract(JSON.stringify(data), { schema: SMALL_SCHEMA })).toEqual(data);
    });

    it('should map null and missing keys to empty strings', () => {
      const result = extract('{"Business Unit": null, "Extra": "ignored"}', { schema: SMALL_SCHEMA });
      expect(result).toEqual({ 'Business Unit': '', Category: '', 'Visuals // Color Palette': '' });
    });

    it('should look keys up exactly', () => {
      const result = extract('{"Color Palette": "Warm", "category": "Skincare", "Business Unit": true}', {
        schema: SMALL_SCHEMA,
      });
      expect(result).toEqual({ 'Business Unit': 'true', Category: '', 'Visuals // Color Palette': '' });
    });
  });

  describe('Markdown-table shape', () => {
    it('should match rows in any order', () => {
      const text = [
        '| Metrics | Value |',
        '|---|---|',
        '| **Color Palette** | Warm pastels |',
        '| Business Unit | Beauty |',
        '| category | Skincare |',
        '| Category | Ignored |',
      ].join('\n');

      expect(extractWithShape(text, { schema: SMALL_SCHEMA })).toEqual({
        shape: 'table',
        result: {
          'Business Unit': 'Beauty',
          Category: 'Skincare',
          'Visuals // Color Palette': 'Warm pastels',
        },
      });
    });

    it('should accept full prefixed labels', () => {
      const text = '| Visuals // Color Palette | Neon |\n| Brand | Glow |';
      expect(extract(text, { schema: SMALL_SCHEMA })['Visuals // Color Palette']).toBe('Neon');
    });

    it('should skip an inner header row', () => {
      const text = 'Analysis below.\n| Metric | Value |\n| --- | --- |\n| Business Unit | Beauty |\n| Category | Haircare |';
      expect(extract(text, { schema: SMALL_SCHEMA })).toEqual({
        'Business Unit': 'Beauty',
        Category: 'Haircare',
        'Visuals // Color Palette': '',
      });
    });

    it('should fall back to prose when no row matches', () => {
      const text = '| foo | bar |\n| baz | qux |\nBusiness Unit: Beauty';
      expect(detectShape(text)).toBe('table');
      expect(extractWithShape(text, { schema: SMALL_SCHEMA })).toEqual({
        shape: 'prose',
        result: { 'Business Unit': 'Beauty', Category: '', 'Visuals // Color Palette': '' },
      });
    });

    it('should fill every schema key', () => {
      const result = extract('| Brand | Glow |\n| Platform | TikTok |');
      expect(Object.keys(result)).toEqual([...METRIC_SCHEMA]);
      expect(result['Brand']).toBe('Glow');
      expect(result['Platform']).toBe('TikTok');
    });
  });

  describe('Flattened prose shape', () => {
    it('should split labelled values', () => {
      const result = extract('Business Unit: Beauty Category: Skincare');
      expect(result['Business Unit']).toBe('Beauty');
      expect(result['Category']).toBe('Skincare');
      expect(Object.keys(result)).toHaveLength(METRIC_SCHEMA.length);
      expect(Object.values(result).filter(value => value !== '')).toEqual(['Beauty', 'Skincare']);
    });

    it('should leave a missing label empty without touching neighbours', () => {
      const result = extract('Business Unit: Beauty Brand: Glow Lab Platform: TikTok');
      expect(result['Business Unit']).toBe('Beauty');
      expect(result['Category']).toBe('');
      expect(result['Brand']).toBe('Glow Lab');
      expect(result['Platform']).toBe('TikTok');
    });

    it('should let longer labels claim their span first', () => {
      const schema = ['Visuals // Setting', 'Visuals // Nature Setting'];
      expect(extract('Nature Setting: Forest Setting: Outdoor', { schema })).toEqual({
        'Visuals // Setting': 'Outdoor',
        'Visuals // Nature Setting': 'Forest',
      });
    });

    it('should prefer the full label over the bare name', () => {
      const schema = ['Visuals // Color Palette'];
      expect(extract('Color Palette: dull. Visuals // Color Palette: vivid', { schema })).toEqual({
        'Visuals // Color Palette': 'vivid',
      });
    });

    it('should ignore label text inside longer words', () => {
      expect(extract('Periodic review. Period: Q3', { schema: ['Period'] })).toEqual({ Period: 'Q3' });
    });

    it('should keep offsets when lower-casing changes the text length', () => {
      const result = extract('Brand: İİİ Glow Platform: TikTok Period: Q3', {
        schema: ['Brand', 'Platform', 'Period'],
      });
      expect(result).toEqual({ Brand: 'İİİ Glow', Platform: 'TikTok', Period: 'Q3' });
    });

    it('should read a flattened table', () => {
      const text = '| Business Unit | Beauty | | Category | Skincare |';
      expect(extract(text, { schema: SMALL_SCHEMA })).toEqual({
        'Business Unit': 'Beauty',
        Category: 'Skincare',
        'Visuals // Color Palette': '',
      });
    });
  });

  describe('empty input', () => {
    it('should return a fully keyed empty result', () => {
      const outcome = extractWithShape('   AI:  ');
      expect(outcome.shape).toBe('empty');
      expect(Object.keys(outcome.result)).toHaveLength(METRIC_SCHEMA.length);
      expect(Object.values(outcome.result).every(value => value === '')).toBe(true);
    });
  });

  describe('detectShape', () => {
    it('should sniff each shape', () => {
      expect(detectShape('{"Brand": "Glow"}')).toBe('json');
      expect(detectShape('| Brand | Glow |\n| Platform | TikTok |')).toBe('table');
      expect(detectShape('Brand: Glow')).toBe('prose');
      expect(detectShape('')).toBe('empty');
    });
  });
});
