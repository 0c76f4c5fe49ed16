/**
 * Playwright video fetcher
 *
 * Drives the downloader sites in Chromium. Every fetch gets a fresh browser
 * context so pop-ups and cookies from one site never leak into the next.
 */

import * as fs from 'fs';
import * as path from 'path';
import { chromium, type Browser, type Download, type Locator, type Page } from 'playwright-core';
import { DEFAULT_TIMEOUTS, Errors, isReelscopeError } from '@reelscope/core';
import type { Logger } from '@reelscope/run-logger';
import { DOWNLOADER_SITES, type DownloaderSite } from './downloader-sites.js';
import type { SupportedPlatform } from './platform.js';

/**
 * Fetches one video to a local file
 */
export interface VideoFetcher {
  fetch(url: string, platform: SupportedPlatform, outputPath: string): Promise<void>;
  close(): Promise<void>;
}

export interface PlaywrightVideoFetcherOptions {
  logger: Logger;
  headless?: boolean;
  slowMoMs?: number;
  browserChannel?: string;
  navigationTimeoutMs?: number;
  downloadTimeoutMs?: number;
  sites?: Partial<Record<SupportedPlatform, DownloaderSite>>;
}

const AD_DISMISS_ROUNDS = 5;

export class PlaywrightVideoFetcher implements VideoFetcher {
  private browser: Browser | null = null;
  private readonly logger: Logger;
  private readonly sites: Record<SupportedPlatform, DownloaderSite>;

  constructor(private readonly options: PlaywrightVideoFetcherOptions) {
    this.logger = options.logger;
    this.sites = { ...DOWNLOADER_SITES, ...options.sites };
  }

  async fetch(url: string, platform: SupportedPlatform, outputPath: string): Promise<void> {
    const site = this.sites[platform];
    const browser = await this.ensureBrowser();
    const context = await browser.newContext({ acceptDownloads: true });
    const page = await context.newPage();
    const navigationTimeout = this.options.navigationTimeoutMs ?? DEFAULT_TIMEOUTS.NAVIGATION;

    try {
      this.logger.debug('Opening downloader site', { site: site.name, url });
      await page.goto(site.url, { waitUntil: 'domcontentloaded', timeout: navigationTimeout });

      const input = await this.waitForAny(page, site.inputSelectors, navigationTimeout);
      await input.fill(url);
      await page.locator(site.submitSelectors.join(', ')).first().click();
      await page.waitForTimeout(site.processingWaitMs);

      for (const selector of site.downloadSelectors) {
        const link = page.locator(selector).first();
        if (!(await link.isVisible())) continue;

        this.logger.debug('Download link found', { selector });
        await this.saveDownload(page, link, outputPath);
        return;
      }

      throw Errors.automation('download', `no download link on ${site.name}`);
    } catch (error) {
      if (isReelscopeError(error)) throw error;
      const cause = error instanceof Error ? error : undefined;
      throw Errors.automation('download', cause?.message ?? String(error), cause);
    } finally {
      await context.close();
    }
  }

  async close(): Promise<void> {
    if (this.browser) {
      await this.browser.close();
      this.browser = null;
      this.logger.debug('Download browser closed');
    }
  }

  private async saveDownload(page: Page, link: Locator, outputPath: string): Promise<void> {
    let started = false;
    // Never rejects; a failed wait resolves to its Error
    const downloadEvent: Promise<Download | Error> = page
      .waitForEvent('download', {
        timeout: this.options.downloadTimeoutMs ?? DEFAULT_TIMEOUTS.DOWNLOAD,
      })
      .then(
        download => download,
        (error: unknown) => (error instanceof Error ? error : new Error(String(error)))
      )
      .finally(() => {
        started = true;
      });

    await link.click();
    await page.waitForTimeout(2_000);

    // The click usually opens advertising first
    for (let round = 0; round < AD_DISMISS_ROUNDS && !started; round++) {
      await this.dismissAds(page);
      await page.waitForTimeout(800);
    }

    const download = await downloadEvent;
    if (download instanceof Error) throw download;
    fs.mkdirSync(path.dirname(path.resolve(outputPath)), { recursive: true });
    await download.saveAs(outputPath);
    this.logger.info('Video saved', { outputPath, suggested: download.suggestedFilename() });
  }

  private async dismissAds(page: Page): Promise<void> {
    try {
      await page.keyboard.press('Escape');

      const viewport = page.viewportSize();
      if (viewport) {
        const positions = [
          { x: viewport.width - 100, y: viewport.height / 2 },
          { x: viewport.width - 150, y: viewport.height / 3 },
          { x: viewport.width - 100, y: viewport.height / 2 + 50 },
        ];
        for (const { x, y } of positions) {
          await page.mouse.click(x, y);
          await page.waitForTimeout(500);
        }
      }

      for (const extra of page.context().pages()) {
        if (extra !== page) await extra.close();
      }
    } catch (error) {
      this.logger.debug('Ad dismissal step failed', {
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }

  private async waitForAny(page: Page, selectors: string[], timeout: number): Promise<Locator> {
    const locator = page.locator(selectors.join(', ')).first();
    await locator.waitFor({ state: 'visible', timeout });
    return locator;
  }

  private async ensureBrowser(): Promise<Browser> {
    if (!this.browser) {
      this.browser = await chromium.launch({
        headless: this.options.headless ?? false,
        slowMo: this.options.slowMoMs,
        channel: this.options.browserChannel,
      });
      this.logger.info('Download browser started', { headless: this.options.headless ?? false });
    }
    return this.browser;
  }
}
