import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { dedupeKeys, readWorkList } from '../../work-list.js';

describe('Work list', () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'reelscope-input-'));
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  const writeInput = (content: string): string => {
    const filePath = path.join(tmpDir, 'data.csv');
    fs.writeFileSync(filePath, content);
    return filePath;
  };

  describe('dedupeKeys', () => {
    it('should drop empty keys and keep first-seen order', () => {
      expect(dedupeKeys(['b', ' a ', '', 'b', 'a', '  ', 'c'])).toEqual(['b', 'a', 'c']);
    });
  });

  describe('readWorkList', () => {
    it('should read the url column', () => {
      const filePath = writeInput(
        'brand,url\nGlow,https://www.tiktok.com/@glow/video/1\nGlow,\nDew,https://www.instagram.com/p/Abc_1/\nGlow,https://www.tiktok.com/@glow/video/1\n'
      );
      expect(readWorkList(filePath)).toEqual([
        'https://www.tiktok.com/@glow/video/1',
        'https://www.instagram.com/p/Abc_1/',
      ]);
    });

    it('should handle a byte order mark and a custom column', () => {
      const filePath = writeInput('\uFEFFlink\nhttps://example.com/a\n');
      expect(readWorkList(filePath, { keyColumn: 'link' })).toEqual(['https://example.com/a']);
    });

    it('should return an empty list for a header-only file', () => {
      expect(readWorkList(writeInput('url\n'))).toEqual([]);
    });

    it('should raise INPUT_NOT_FOUND for a missing file', () => {
      expect(() => readWorkList(path.join(tmpDir, 'missing.csv'))).toThrow(
        'Input file not found'
      );
    });

    it('should raise INVALID_INPUT for a missing column', () => {
      expect(() => readWorkList(writeInput('link\nhttps://example.com/a\n'))).toThrow(
        'Input file has no "url" column'
      );
    });
  });
});
