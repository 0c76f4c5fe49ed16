import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { loadConfig, defaultConfig } from '../../config/app-config.js';
import { ReelscopeError } from '../../errors.js';

describe('App config', () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'reelscope-config-'));
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  describe('defaultConfig', () => {
    it('should apply defaults', () => {
      const config = defaultConfig();
      expect(config.outputFile).toBe('output.csv');
      expect(config.maxRetries).toBe(2);
      expect(config.streamingMaxRetries).toBe(5);
      expect(config.pollIntervalMs).toBe(2000);
      expect(config.maxPolls).toBe(300);
      expect(config.headless).toBe(false);
      expect(config.deleteAfterUpload).toBe(true);
      expect(config.batchSize).toBeUndefined();
    });
  });

  describe('loadConfig', () => {
    it('should layer file, env and overrides', () => {
      const configPath = path.join(tmpDir, 'config.json');
      fs.writeFileSync(
        configPath,
        JSON.stringify({ outputFile: 'file.csv', maxRetries: 4, pollIntervalMs: 500 })
      );

      const config = loadConfig({
        configPath,
        env: { REELSCOPE_MAX_RETRIES: '3', REELSCOPE_HEADLESS: 'true' },
        overrides: { maxRetries: 1, batchSize: undefined },
      });

      expect(config.outputFile).toBe('file.csv');
      expect(config.pollIntervalMs).toBe(500);
      expect(config.headless).toBe(true);
      expect(config.maxRetries).toBe(1);
    });

    it('should ignore empty environment values', () => {
      const config = loadConfig({ env: { REELSCOPE_OUTPUT_FILE: '' } });
      expect(config.outputFile).toBe('output.csv');
    });

    it('should coerce numeric environment values', () => {
      const config = loadConfig({ env: { REELSCOPE_BATCH_SIZE: '10' } });
      expect(config.batchSize).toBe(10);
    });

    it('should reject invalid values with a configuration error', () => {
      let caught: unknown;
      try {
        loadConfig({ env: { REELSCOPE_MAX_POLLS: '0' } });
      } catch (error) {
        caught = error;
      }
      expect(caught).toBeInstanceOf(ReelscopeError);
      expect(caught instanceof ReelscopeError && caught.code).toBe('CONFIGURATION_ERROR');
    });

    it('should reject a missing config file', () => {
      expect(() => loadConfig({ configPath: path.join(tmpDir, 'missing.json'), env: {} })).toThrow(
        'Input file not found'
      );
    });

    it('should reject a config file that is not an object', () => {
      const configPath = path.join(tmpDir, 'config.json');
      fs.writeFileSync(configPath, '[1, 2]');
      expect(() => loadConfig({ configPath, env: {} })).toThrow('must contain a JSON object');
    });
  });
});
