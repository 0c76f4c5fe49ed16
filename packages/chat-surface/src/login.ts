/**
 * Interactive login
 *
 * Opens a visible browser on the chat page, lets the operator log in by
 * hand and saves the resulting session for later headless runs.
 */

import { Errors, isReelscopeError } from '@reelscope/core';
import type { Logger } from '@reelscope/run-logger';
import { PlaywrightChatSurface, type PlaywrightChatSurfaceOptions } from './playwright-surface.js';

export interface InteractiveLoginOptions extends Omit<PlaywrightChatSurfaceOptions, 'headless' | 'logger'> {
  chatUrl: string;
  logger: Logger;
  /** Resolves once the operator says the login is done */
  confirm: () => Promise<void>;
}

/**
 * Minimal surface the login flow needs
 */
export interface LoginSurface {
  open(target: string): Promise<unknown>;
  persistSessionToken(): Promise<void>;
  sessionTokenPresent(): Promise<boolean>;
  close(): Promise<void>;
}

/**
 * Run the login flow; returns true once a usable session was saved
 */
export async function interactiveLogin(
  options: InteractiveLoginOptions,
  surface: LoginSurface = new PlaywrightChatSurface({ ...options, headless: false })
): Promise<boolean> {
  const logger = options.logger;

  try {
    logger.info('Opening browser for login', { chatUrl: options.chatUrl });
    await surface.open(options.chatUrl);

    await options.confirm();

    await surface.persistSessionToken();
    const saved = await surface.sessionTokenPresent();
    if (saved) {
      logger.info('Session saved', { sessionFile: options.sessionFile });
    } else {
      logger.warn('Saved session holds no cookies; the login may not have completed', {
        sessionFile: options.sessionFile,
      });
    }
    return saved;
  } catch (error) {
    if (isReelscopeError(error)) throw error;
    const cause = error instanceof Error ? error : undefined;
    throw Errors.automation('login', cause?.message ?? String(error), cause);
  } finally {
    await surface.close();
  }
}
