/**
 * Platform detection and artifact naming
 */

import * as path from 'path';

export type Platform = 'tiktok' | 'instagram' | 'unknown';
export type SupportedPlatform = Exclude<Platform, 'unknown'>;

const VIDEO_ID_PATTERNS: Record<SupportedPlatform, RegExp> = {
  tiktok: /\/video\/(\d+)/,
  instagram: /\/p\/([A-Za-z0-9_-]+)/,
};

/**
 * Detect the platform from the URL's host name
 */
export function detectPlatform(url: string): Platform {
  let host: string;
  try {
    host = new URL(url).hostname.toLowerCase();
  } catch {
    return 'unknown';
  }

  if (host.includes('tiktok')) return 'tiktok';
  if (host.includes('instagram')) return 'instagram';
  return 'unknown';
}

export function isSupportedPlatform(platform: Platform): platform is SupportedPlatform {
  return platform !== 'unknown';
}

/**
 * Video id (TikTok) or shortcode (Instagram) embedded in the URL
 */
export function extractVideoId(url: string): string | undefined {
  const platform = detectPlatform(url);
  if (!isSupportedPlatform(platform)) return undefined;
  return VIDEO_ID_PATTERNS[platform].exec(url)?.[1];
}

/**
 * File name of the downloaded video, e.g. `tiktok_7301234567890.mp4`
 *
 * Falls back to the work-list index when the URL carries no id.
 */
export function artifactFilename(url: string, index: number): string {
  const platform = detectPlatform(url);
  const id = extractVideoId(url) ?? String(index);
  return `${platform}_${id}.mp4`;
}

export function artifactPath(downloadsDir: string, url: string, index: number): string {
  return path.join(downloadsDir, artifactFilename(url, index));
}
