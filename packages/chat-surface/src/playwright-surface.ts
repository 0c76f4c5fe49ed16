/**
 * Playwright Chat Surface
 *
 * Drives a web chat page in Chromium. One page is reused for the whole run;
 * the saved session is loaded into the browser context and refreshed after
 * each submission.
 */

import * as fs from 'fs';
import * as path from 'path';
import { chromium, type Browser, type BrowserContext, type Locator, type Page } from 'playwright-core';
import {
  DEFAULT_TIMEOUTS,
  Errors,
  isReelscopeError,
  type AutomationSurface,
} from '@reelscope/core';
import type { Logger } from '@reelscope/run-logger';
import { resolveSelectors, type ChatSurfaceSelectors } from './selectors.js';
import { SessionTokenStore } from './session-token.js';

export interface PlaywrightChatSurfaceOptions {
  sessionFile: string;
  logger: Logger;
  headless?: boolean;
  slowMoMs?: number;
  /** Installed browser channel, e.g. "chrome" */
  browserChannel?: string;
  navigationTimeoutMs?: number;
  selectors?: Partial<ChatSurfaceSelectors>;
}

export class PlaywrightChatSurface implements AutomationSurface {
  private readonly options: PlaywrightChatSurfaceOptions;
  private readonly selectors: ChatSurfaceSelectors;
  private readonly token: SessionTokenStore;
  private readonly logger: Logger;
  private browser: Browser | null = null;
  private context: BrowserContext | null = null;
  private page: Page | null = null;
  private useSavedSession = false;

  constructor(options: PlaywrightChatSurfaceOptions) {
    this.options = options;
    this.selectors = resolveSelectors(options.selectors);
    this.token = new SessionTokenStore(options.sessionFile);
    this.logger = options.logger;
  }

  async sessionTokenPresent(): Promise<boolean> {
    return this.token.present();
  }

  async loadSessionToken(): Promise<boolean> {
    const present = this.token.present();
    if (present !== this.useSavedSession && this.context) {
      // The context was created with the other storage state
      await this.closeContext();
    }
    this.useSavedSession = present;
    this.logger.debug('Session token checked', { sessionFile: this.token.path, present });
    return present;
  }

  async persistSessionToken(): Promise<void> {
    const context = this.context;
    if (!context) return;
    fs.mkdirSync(path.dirname(path.resolve(this.token.path)), { recursive: true });
    await context.storageState({ path: this.token.path });
  }

  /**
   * Open a page without checking the login state
   */
  async open(target: string): Promise<Page> {
    const page = await this.ensurePage();
    try {
      await page.goto(target, {
        waitUntil: 'domcontentloaded',
        timeout: this.options.navigationTimeoutMs ?? DEFAULT_TIMEOUTS.NAVIGATION,
      });
    } catch (error) {
      throw Errors.automation('navigate', messageOf(error), asCause(error));
    }
    return page;
  }

  async navigate(target: string): Promise<void> {
    const page = await this.open(target);
    await this.assertLoggedIn(page);
    this.logger.debug('Chat page ready', { url: page.url() });
  }

  async submitArtifact(artifactRef: string): Promise<void> {
    const page = this.requirePage('submitArtifact');
    const filePath = path.resolve(artifactRef);
    if (!fs.existsSync(filePath)) {
      throw Errors.automation('submitArtifact', `artifact not found: ${filePath}`);
    }

    try {
      const input = await this.firstAttached(page, this.selectors.fileInputs);
      if (input) {
        await input.setInputFiles(filePath);
        this.logger.debug('Attached video via file input', { filePath });
        return;
      }

      const trigger = await this.firstVisible(page, this.selectors.uploadTriggers);
      if (trigger) {
        const [chooser] = await Promise.all([
          page.waitForEvent('filechooser', { timeout: 10_000 }),
          trigger.click(),
        ]);
        await chooser.setFiles(filePath);
        this.logger.debug('Attached video via file chooser', { filePath });
        return;
      }
    } catch (error) {
      throw Errors.automation('submitArtifact', messageOf(error), asCause(error));
    }

    throw Errors.automation('submitArtifact', 'no upload control found');
  }

  async submitText(prompt: string): Promise<void> {
    const page = this.requirePage('submitText');

    try {
      const input = await this.firstVisible(page, this.selectors.promptInputs);
      if (!input) {
        throw Errors.automation('submitText', 'no prompt input found');
      }
      await input.fill(prompt);

      const send = await this.firstVisible(page, this.selectors.sendButtons);
      if (send && (await send.isEnabled())) {
        await send.click();
      } else {
        await input.press('Enter');
      }
    } catch (error) {
      if (isReelscopeError(error)) throw error;
      throw Errors.automation('submitText', messageOf(error), asCause(error));
    }
  }

  async pollText(): Promise<string> {
    const page = this.requirePage('pollText');
    await this.assertLoggedIn(page);

    for (const selector of this.selectors.responses) {
      const matches = page.locator(selector);
      const count = await matches.count();
      if (count === 0) continue;

      const text = await matches.nth(count - 1).innerText();
      if (text.trim() !== '') return text.trim();
    }
    return '';
  }

  async close(): Promise<void> {
    await this.closeContext();
    if (this.browser) {
      await this.browser.close();
      this.browser = null;
    }
  }

  private async ensurePage(): Promise<Page> {
    if (this.page && !this.page.isClosed()) {
      return this.page;
    }

    if (!this.browser) {
      this.browser = await chromium.launch({
        headless: this.options.headless ?? false,
        slowMo: this.options.slowMoMs,
        channel: this.options.browserChannel,
      });
      this.logger.info('Browser started', {
        headless: this.options.headless ?? false,
        channel: this.options.browserChannel,
      });
    }

    if (!this.context) {
      this.context = await this.browser.newContext(
        this.useSavedSession ? { storageState: this.token.path } : {}
      );
    }

    this.page = await this.context.newPage();
    return this.page;
  }

  private async closeContext(): Promise<void> {
    if (this.context) {
      await this.context.close();
    }
    this.context = null;
    this.page = null;
  }

  private requirePage(action: string): Page {
    if (!this.page || this.page.isClosed()) {
      throw Errors.automation(action, 'no chat page open');
    }
    return this.page;
  }

  private async assertLoggedIn(page: Page): Promise<void> {
    const url = page.url().toLowerCase();
    const loginPattern = this.selectors.loginUrlPatterns.find(pattern =>
      url.includes(pattern.toLowerCase())
    );
    if (loginPattern) {
      throw Errors.sessionInvalid(`redirected to login page (${page.url()})`);
    }

    const credentialField = await this.firstVisible(page, this.selectors.credentialFields);
    if (credentialField) {
      throw Errors.sessionInvalid('login form is showing');
    }
  }

  private async firstVisible(page: Page, selectors: readonly string[]): Promise<Locator | undefined> {
    for (const selector of selectors) {
      const locator = page.locator(selector).first();
      if (await locator.isVisible()) return locator;
    }
    return undefined;
  }

  private async firstAttached(page: Page, selectors: readonly string[]): Promise<Locator | undefined> {
    for (const selector of selectors) {
      const locator = page.locator(selector).first();
      if ((await locator.count()) > 0) return locator;
    }
    return undefined;
  }
}

function messageOf(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function asCause(error: unknown): Error | undefined {
  return error instanceof Error ? error : undefined;
}
