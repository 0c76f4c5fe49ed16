/**
 * Third-party downloader sites
 *
 * Each platform is fetched through a public downloader page: paste the URL,
 * submit, wait for the page to resolve the video and click the download link.
 */

import type { SupportedPlatform } from './platform.js';

export interface DownloaderSite {
  name: string;
  url: string;
  inputSelectors: string[];
  submitSelectors: string[];
  downloadSelectors: string[];
  /** Time the site needs to resolve the video after submit */
  processingWaitMs: number;
}

export const DOWNLOADER_SITES: Record<SupportedPlatform, DownloaderSite> = {
  tiktok: {
    name: 'snaptik',
    url: 'https://snaptik.app/',
    inputSelectors: ['input[name="url"]', 'input[type="text"]', '#url'],
    submitSelectors: ['button[type="submit"]', '.button-go', '#submiturl'],
    downloadSelectors: [
      'a[href*="download"]',
      'a.download-file',
      '.video-links a',
      'a:has-text("Download")',
      'a:has-text("Server")',
    ],
    processingWaitMs: 5_000,
  },
  instagram: {
    name: 'snapvideo',
    url: 'https://snapvideo.app/en',
    inputSelectors: ['input[name="url"]', 'input[type="text"]', '#url'],
    submitSelectors: ['button:has-text("Download")', '.btn-download', '#download-btn', 'button[type="submit"]'],
    downloadSelectors: [
      'a[href*="download"]',
      'a.download-btn',
      '.download-items a',
      'a:has-text("Download")',
      'a:has-text("Video")',
    ],
    processingWaitMs: 10_000,
  },
};
