/**
 * Constants for the Reelscope pipeline
 */

/**
 * Default timeout and wait values in milliseconds
 */
export const DEFAULT_TIMEOUTS = {
  /** Page navigation timeout */
  NAVIGATION: 60_000, // 60 seconds

  /** Settle delay after navigating to the chat page */
  PAGE_SETTLE: 2_000,

  /** Settle delay after handing the video to the chat page */
  UPLOAD_SETTLE: 3_000,

  /** Interval between response polls */
  POLL_INTERVAL: 2_000,

  /** Delay between two uploaded items */
  INTER_ITEM_DELAY: 5_000,

  /** Delay between two downloaded items */
  DOWNLOAD_DELAY: 2_000,

  /** Time allowed for a single file download to finish */
  DOWNLOAD: 120_000, // 2 minutes
} as const;

/**
 * Maximum retry values
 */
export const MAX_RETRIES = {
  /** Extra chat submissions per item */
  UPLOAD: 2,

  /** Extra chat submissions per item in batch streaming mode */
  UPLOAD_STREAMING: 5,

  /** Download attempts per item */
  DOWNLOAD: 3,
} as const;

/**
 * Response classification thresholds
 */
export const RESPONSE_THRESHOLDS = {
  /** Header-only snapshots shorter than this are skeleton renders */
  SHORT_RESPONSE: 200,

  /** Minimum length of an answer that can be complete */
  SUBSTANTIAL_RESPONSE: 800,

  /** Consecutive identical polls that count as a finished stream */
  STABLE_POLLS: 5,

  /** Poll ceiling for one attempt (300 x 2s = 10 minutes) */
  MAX_POLLS: 300,

  /** Snapshots kept for stability detection */
  HISTORY_LIMIT: 10,
} as const;

/**
 * Final completeness check bounds
 */
export const COMPLETENESS_BOUNDS = {
  /** Answers longer than this are accepted outright */
  ACCEPT_ABOVE: 2_000,

  /** Lower bound of the marker-checked window */
  WINDOW_MIN: 500,

  /** Upper bound of the marker-checked window */
  WINDOW_MAX: 1_500,
} as const;

/**
 * Result store layout
 */
export const STORE_LAYOUT = {
  /** Name of the key column */
  KEY_COLUMN: 'url',

  /** Header of the two-column legacy store */
  LEGACY_HEADER: ['url', 'message'],

  /** Suffix of the backup written before a legacy migration */
  BACKUP_SUFFIX: '.legacy.bak',

  /** Suffix of the backup written before a header rewrite */
  SCHEMA_BACKUP_SUFFIX: '.schema.bak',

  /** Prefix of the sentinel written for items that never reached the chat */
  FAILURE_PREFIX: 'FAILED: ',
} as const;
