import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { METRIC_SCHEMA, defaultConfig, type AppConfig } from '@reelscope/core';
import { ScriptedChatSurface } from '@reelscope/chat-surface';
import { createTestRunLogger } from '@reelscope/run-logger';
import { createRunContext, disposeRunContext } from '../../run-context.js';

describe('Run context', () => {
  let tmpDir: string;
  let config: AppConfig;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'reelscope-context-'));
    config = {
      ...defaultConfig(),
      outputFile: path.join(tmpDir, 'output.csv'),
      sessionFile: path.join(tmpDir, 'session.json'),
    };
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it('should open the CSV store and create its header', async () => {
    const { logger } = createTestRunLogger();
    const context = await createRunContext(config, { logger });

    expect(context.store.schema).toEqual(METRIC_SCHEMA);
    expect(fs.readFileSync(config.outputFile, 'utf-8').split('\n')[0]?.startsWith('url,')).toBe(true);
    expect(context.runId).toBe(logger.runId);

    await disposeRunContext(context);
  });

  it('should log whether a session was saved', async () => {
    fs.writeFileSync(config.sessionFile, JSON.stringify({ cookies: [{ name: 'sid', value: 'test-secret' }] }));
    const { logger, transport } = createTestRunLogger();
    const context = await createRunContext(config, { logger });

    const started = transport.getEntries().find(entry => entry.message === 'Run started');
    expect(started?.context).toEqual({ outputFile: config.outputFile, sessionPresent: true });
    await disposeRunContext(context);
  });

  it('should close the chat surface on dispose', async () => {
    const context = await createRunContext(config, { logger: createTestRunLogger().logger });
    const surface = new ScriptedChatSurface();
    context.surface = surface;

    await disposeRunContext(context);

    expect(surface.closed).toBe(true);
    expect(context.surface).toBeUndefined();
  });

  it('should fail when the store cannot be written', async () => {
    const blocker = path.join(tmpDir, 'blocker');
    fs.writeFileSync(blocker, '');
    const { logger, transport } = createTestRunLogger();

    await expect(
      createRunContext({ ...config, outputFile: path.join(blocker, 'output.csv') }, { logger })
    ).rejects.toThrow(`Could not write result store: ${path.join(blocker, 'output.csv')}`);
    expect(transport.messages('error')).toEqual(['Run context could not be created']);
  });
});
