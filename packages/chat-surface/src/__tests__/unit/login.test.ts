import { describe, it, expect, vi } from 'vitest';
import { createTestRunLogger } from '@reelscope/run-logger';
import { interactiveLogin, type LoginSurface } from '../../login.js';

class FakeLoginSurface implements LoginSurface {
  readonly opened: string[] = [];
  persisted = false;
  closed = false;

  constructor(private readonly cookiesAfterLogin: boolean) {}

  async open(target: string): Promise<void> {
    this.opened.push(target);
  }

  async persistSessionToken(): Promise<void> {
    this.persisted = true;
  }

  async sessionTokenPresent(): Promise<boolean> {
    return this.persisted && this.cookiesAfterLogin;
  }

  async close(): Promise<void> {
    this.closed = true;
  }
}

describe('interactiveLogin', () => {
  it('should save the session after the operator confirms', async () => {
    const { logger, transport } = createTestRunLogger();
    const surface = new FakeLoginSurface(true);
    const confirm = vi.fn(async () => {
      expect(surface.persisted).toBe(false);
    });

    const saved = await interactiveLogin(
      { chatUrl: 'https://chat.example.com/', sessionFile: 'session.json', logger, confirm },
      surface
    );

    expect(saved).toBe(true);
    expect(confirm).toHaveBeenCalledTimes(1);
    expect(surface.opened).toEqual(['https://chat.example.com/']);
    expect(surface.closed).toBe(true);
    expect(transport.messages('info')).toContain('Session saved');
  });

  it('should warn when the saved session holds no cookies', async () => {
    const { logger, transport } = createTestRunLogger();
    const surface = new FakeLoginSurface(false);

    const saved = await interactiveLogin(
      { chatUrl: 'https://chat.example.com/', sessionFile: 'session.json', logger, confirm: async () => {} },
      surface
    );

    expect(saved).toBe(false);
    expect(transport.messages('warn')).toEqual([
      'Saved session holds no cookies; the login may not have completed',
    ]);
  });

  it('should close the browser when the operator aborts', async () => {
    const { logger } = createTestRunLogger();
    const surface = new FakeLoginSurface(true);

    await expect(
      interactiveLogin(
        {
          chatUrl: 'https://chat.example.com/',
          sessionFile: 'session.json',
          logger,
          confirm: async () => {
            throw new Error('stdin closed');
          },
        },
        surface
      )
    ).rejects.toThrow('login failed: stdin closed');
    expect(surface.closed).toBe(true);
    expect(surface.persisted).toBe(false);
  });
});
