/**
 * @reelscope/downloader
 *
 * Short-form video downloading through third-party downloader sites.
 */

export {
  detectPlatform,
  isSupportedPlatform,
  extractVideoId,
  artifactFilename,
  artifactPath,
} from './platform.js';
export type { Platform, SupportedPlatform } from './platform.js';

export { DOWNLOADER_SITES } from './downloader-sites.js';
export type { DownloaderSite } from './downloader-sites.js';

export { PlaywrightVideoFetcher } from './playwright-fetcher.js';
export type { VideoFetcher, PlaywrightVideoFetcherOptions } from './playwright-fetcher.js';

export { VideoDownloader } from './video-downloader.js';
export type {
  DownloadStatus,
  DownloadRequest,
  DownloadResult,
  DownloadSummary,
  VideoDownloaderOptions,
} from './video-downloader.js';
